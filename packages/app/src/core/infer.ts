import { buildTypeTree } from "./build.js"
import type { Declaration } from "./emit.js"
import { emitDeclarations } from "./emit.js"
import { hashTypeTree } from "./fingerprint.js"
import type { Json } from "./json.js"
import type { PrintOptions } from "./print.js"
import { defaultPrintOptions, renderDeclarations } from "./print.js"
import { buildSignatureRegistry } from "./registry.js"
import { buildTypeCache } from "./type-cache.js"

// CHANGE: run build → hash → registry → cache → emit as one engine call
// WHY: give the shell a single pure entrypoint with statistics for logging
// REF: req-infer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,o: infer(v,o) = infer(v,o) (byte-identical across runs)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no state survives between two calls
// COMPLEXITY: O(n)

export interface InferOptions {
  readonly squash: boolean
  readonly rootName: string
}

export const DEFAULT_ROOT_NAME = "DefaultType"

export const defaultInferOptions: InferOptions = { squash: true, rootName: DEFAULT_ROOT_NAME }

export interface InferStats {
  readonly nodes: number
  readonly fingerprints: number
  readonly sharedTypes: number
}

export interface InferResult {
  readonly declarations: ReadonlyArray<Declaration>
  readonly stats: InferStats
}

/**
 * Infer the declaration list for a JSON document.
 *
 * @param value - Parsed JSON document.
 * @param options - squash switch and root declaration name.
 * @returns Declarations (root last) and run statistics.
 *
 * @pure true
 * @invariant declarations never contain two entries with the same name
 * @complexity O(n)
 */
export const inferDeclarations = (value: Json, options: InferOptions = defaultInferOptions): InferResult => {
  const root = hashTypeTree(buildTypeTree(value))
  const registry = buildSignatureRegistry(root)
  const cache = buildTypeCache(registry, options)
  const declarations = emitDeclarations(root, cache, options.rootName)
  const nodes = [...registry.values()].reduce((total, entry) => total + entry.nodes.length, 1)
  return {
    declarations,
    stats: { nodes, fingerprints: registry.size, sharedTypes: cache.size }
  }
}

/**
 * Infer and render TypeScript source for a JSON document.
 *
 * @pure true
 * @complexity O(n)
 */
export const inferTypeScript = (
  value: Json,
  options: InferOptions = defaultInferOptions,
  printOptions: PrintOptions = defaultPrintOptions
): string => renderDeclarations(inferDeclarations(value, options).declarations, printOptions)
