// src/url/transformer.ts — Request transform orchestrator
//
// Owns the path and query protectors for one installation and picks the query
// strategy for the pipeline phase. Path rewriting has to happen before routing
// (the rewritten path is what routes match), while schema-driven query decryption
// needs the route's target shape and can only run after routing.

import type { TSchema } from "@sinclair/typebox"
import type { DataProtectionProvider, Protector } from "../crypto/protector.js"
import { decryptPath, encryptPath } from "./path-strategy.js"
import type { SegmentSelector } from "./path-strategy.js"
import { greedyDecryptQuery, schemaDecryptQuery } from "./query-strategy.js"
import type { QueryDecryptionResult, QueryLogger, QueryMap, QueryStrategy } from "./query-strategy.js"

export type PipelinePhase = "pre-routing" | "post-routing"

export interface UrlTransformerConfig {
  pathPurpose: string
  queryPurpose: string
  /** Phase in which query parameters are decrypted */
  queryPhase: PipelinePhase
  ignoreUnencryptedWarnings: boolean
  showErrorDetails: boolean
  /** Outbound path segments to re-encrypt; unset disables the outbound transform */
  outboundSegments?: SegmentSelector
  /** Logger (default: console) */
  logger?: QueryLogger
}

export interface UrlView {
  path: string
  query: QueryMap
}

export interface TransformedUrlView extends UrlView {
  keysWithErrors: string[]
}

export class UrlTransformer {
  readonly queryPhase: PipelinePhase
  private readonly pathProtector: Protector
  private readonly queryProtector: Protector
  private readonly config: UrlTransformerConfig

  constructor(provider: DataProtectionProvider, config: UrlTransformerConfig) {
    this.pathProtector = provider.createProtector(config.pathPurpose)
    this.queryProtector = provider.createProtector(config.queryPurpose)
    this.queryPhase = config.queryPhase
    this.config = config
  }

  /** Greedy before routing or without a shape; schema-driven after routing with one. */
  selectQueryStrategy(phase: PipelinePhase, shape?: TSchema): QueryStrategy {
    if (phase === "post-routing" && shape) return { kind: "schema", shape }
    return { kind: "greedy" }
  }

  async decryptPath(path: string): Promise<string> {
    return decryptPath(this.pathProtector, path)
  }

  async decryptQuery(query: QueryMap, strategy: QueryStrategy): Promise<QueryDecryptionResult> {
    switch (strategy.kind) {
      case "greedy":
        return greedyDecryptQuery(this.queryProtector, query)
      case "schema":
        return schemaDecryptQuery(this.queryProtector, query, strategy.shape, {
          ignoreUnencryptedWarnings: this.config.ignoreUnencryptedWarnings,
          showErrorDetails: this.config.showErrorDetails,
          logger: this.config.logger,
        })
    }
  }

  /** Rewrite an inbound path and query; path and query are transformed independently. */
  async transformInbound(view: UrlView, strategy: QueryStrategy): Promise<TransformedUrlView> {
    const [path, decrypted] = await Promise.all([
      this.decryptPath(view.path),
      this.decryptQuery(view.query, strategy),
    ])
    return { path, query: decrypted.query, keysWithErrors: decrypted.keysWithErrors }
  }

  get outboundEnabled(): boolean {
    return this.config.outboundSegments !== undefined
  }

  /** Re-encrypt an outbound path with the configured segment selector (identity when unset). */
  async transformOutbound(path: string): Promise<string> {
    if (!this.config.outboundSegments) return path
    return encryptPath(this.pathProtector, path, this.config.outboundSegments)
  }

  /** Build an encrypted path for links; `select` defaults to every segment. */
  async protectPath(path: string, select?: SegmentSelector): Promise<string> {
    return encryptPath(this.pathProtector, path, select)
  }

  /** Encrypt every value of `keys` in a fresh copy of `query`. */
  async protectQuery(query: QueryMap, keys: readonly string[]): Promise<QueryMap> {
    const encrypted = new Set(keys)
    const entries = await Promise.all(
      [...query].map(async ([key, values]): Promise<[string, string[]]> => [
        key,
        encrypted.has(key)
          ? await Promise.all(values.map((value) => this.queryProtector.protect(value)))
          : [...values],
      ]),
    )
    return new Map(entries)
  }
}
