export function dot(a: number[], b: number[]): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i]
  return sum
}

export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a))
}

/** 0 when either vector has zero length */
export function cosineSimilarity(a: number[], b: number[]): number {
  const denominator = norm(a) * norm(b)
  return denominator === 0 ? 0 : dot(a, b) / denominator
}

/**
 * Similarity desc, then document id asc, then position asc
 */
export function compareScored(
  a: { similarity: number; documentId: number; position: number },
  b: { similarity: number; documentId: number; position: number }
): number {
  return (
    b.similarity - a.similarity || a.documentId - b.documentId || a.position - b.position
  )
}
