import type { TypeExpr } from "./expression.js"
import { declarationBody } from "./expression.js"
import type { RegistryEntry, SignatureRegistry } from "./registry.js"
import type { Fingerprint, HashedNode } from "./type-node.js"

// CHANGE: mint one shared declaration per repeated object shape
// WHY: repeated structures are emitted once and referenced by name everywhere else
// REF: req-type-cache-1
// SOURCE: n/a
// FORMAT THEOREM: ∀fp: fp ∈ cache ↔ squash ∧ count(fp) ≥ 2 ∧ kind(fp) = Object
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: generated names are `${rootName}_${i}`, unique, in registry order
// COMPLEXITY: O(n)

export interface TypeCacheEntry {
  readonly fingerprint: Fingerprint
  readonly name: string
  readonly representative: HashedNode
  readonly body: TypeExpr
  readonly usages: number
}

export type TypeCache = ReadonlyMap<Fingerprint, TypeCacheEntry>

export interface TypeCacheOptions {
  readonly squash: boolean
  readonly rootName: string
}

export const emptyTypeCache: TypeCache = new Map()

const sharedName = (rootName: string, index: number): string => `${rootName}_${index}`

interface Candidate {
  readonly entry: RegistryEntry
  readonly representative: HashedNode
}

const toCandidate = (entry: RegistryEntry): ReadonlyArray<Candidate> => {
  const representative = entry.nodes[0]
  return representative !== undefined && representative._tag === "Object" && entry.count >= 2
    ? [{ entry, representative }]
    : []
}

/**
 * Decide which fingerprints become shared declarations and render their bodies.
 *
 * @param registry - Signature registry of one run.
 * @param options - squash switch and the root declaration name.
 * @returns Cache keyed by fingerprint, in name order.
 *
 * @pure true
 * @invariant squash = false → cache is empty
 * @complexity O(n)
 */
export const buildTypeCache = (registry: SignatureRegistry, options: TypeCacheOptions): TypeCache => {
  if (!options.squash) {
    return emptyTypeCache
  }
  const candidates = [...registry.values()].flatMap(toCandidate)
  const names = new Map<Fingerprint, string>(
    candidates.map(({ entry }, index) => [entry.fingerprint, sharedName(options.rootName, index)] as const)
  )
  const resolve = (fingerprint: Fingerprint): string | undefined => names.get(fingerprint)
  const cache = new Map<Fingerprint, TypeCacheEntry>()
  candidates.forEach(({ entry, representative }, index) => {
    cache.set(entry.fingerprint, {
      fingerprint: entry.fingerprint,
      name: sharedName(options.rootName, index),
      representative,
      body: declarationBody(representative, resolve),
      usages: entry.count
    })
  })
  return cache
}
