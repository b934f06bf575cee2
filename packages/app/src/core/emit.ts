import type { TypeExpr } from "./expression.js"
import { declarationBody, referencedNames } from "./expression.js"
import type { TypeCache, TypeCacheEntry } from "./type-cache.js"
import type { Fingerprint, HashedNode } from "./type-node.js"

// CHANGE: emit named declarations in dependency order
// WHY: every shared type must be declared before the declaration that first references it
// REF: req-emit-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i<j: decl[j] ∉ refs(decl[i])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each cache entry is emitted at most once; the root is emitted last
// COMPLEXITY: O(n)

export interface Declaration {
  readonly name: string
  readonly body: TypeExpr
}

/**
 * Walk the hashed tree and flush declarations, shared ones before their users.
 *
 * @param root - Hashed root node.
 * @param cache - Type cache of the same run (empty when squashing is disabled).
 * @param rootName - Name of the root declaration.
 * @returns Declarations in emission order.
 *
 * @pure true
 * @invariant last element is the root declaration
 * @complexity O(n)
 */
export const emitDeclarations = (
  root: HashedNode,
  cache: TypeCache,
  rootName: string
): ReadonlyArray<Declaration> => {
  const byName = new Map<string, TypeCacheEntry>([...cache.values()].map((entry) => [entry.name, entry] as const))
  const resolve = (fingerprint: Fingerprint): string | undefined => cache.get(fingerprint)?.name
  const emitted = new Set<string>()
  const declarations: Array<Declaration> = []

  const flushDependencies = (body: TypeExpr): void => {
    for (const name of referencedNames(body)) {
      const entry = byName.get(name)
      if (entry !== undefined && !emitted.has(name)) {
        emitted.add(name)
        flushDependencies(entry.body)
        declarations.push({ name: entry.name, body: entry.body })
      }
    }
  }

  const rootBody = declarationBody(root, resolve)
  flushDependencies(rootBody)
  declarations.push({ name: rootName, body: rootBody })
  return declarations
}
