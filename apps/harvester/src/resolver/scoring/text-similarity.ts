/**
 * Name similarity for canonical product names.
 *
 * A name is reduced once to a TokenBag (tokens, counts, distinct set) and
 * compared with TF-IDF cosine and Jaccard. IDF is computed over the pair
 * being compared, so terms both names share weigh less than terms only
 * one of them has.
 */

// Connectives that carry no product identity in Spanish listing titles
export const STOPWORDS: ReadonlySet<string> = new Set(['de', 'del', 'la', 'el', 'los', 'las', 'con', 'para', 'y', 'en', 'por'])

const DIGIT_HYPHEN = /^(\d+[a-z]*)-([a-z0-9]+)$/

/**
 * Lowercase, drop punctuation other than in-word hyphens, split on
 * whitespace and drop stopwords. "50ml-pack" splits into ["50ml", "pack"];
 * "anti-edad" stays whole.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, ' ')
    .split(/\s+/)
    .flatMap((token) => {
      const match = DIGIT_HYPHEN.exec(token)
      return match ? [match[1], match[2]] : [token]
    })
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
}

export interface TokenBag {
  tokens: readonly string[]
  counts: ReadonlyMap<string, number>
  distinct: ReadonlySet<string>
}

export function toBag(textOrTokens: string | readonly string[]): TokenBag {
  const tokens = typeof textOrTokens === 'string' ? tokenize(textOrTokens) : textOrTokens
  const counts = new Map<string, number>()
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1)
  return { tokens, counts, distinct: new Set(counts.keys()) }
}

/**
 * Term frequency normalized by document length
 */
export function termFrequencies(bag: TokenBag): Map<string, number> {
  const tf = new Map<string, number>()
  if (bag.tokens.length === 0) return tf
  for (const [term, count] of bag.counts) tf.set(term, count / bag.tokens.length)
  return tf
}

/**
 * Smoothed IDF over a corpus: log((N + 1) / (df + 1)) + 1
 */
export function inverseDocumentFrequencies(corpus: readonly TokenBag[]): Map<string, number> {
  const df = new Map<string, number>()
  for (const bag of corpus) {
    for (const term of bag.distinct) df.set(term, (df.get(term) ?? 0) + 1)
  }

  const idf = new Map<string, number>()
  for (const [term, frequency] of df) {
    idf.set(term, Math.log((corpus.length + 1) / (frequency + 1)) + 1)
  }
  return idf
}

function weigh(bag: TokenBag, idf: ReadonlyMap<string, number>): Map<string, number> {
  const weights = new Map<string, number>()
  for (const [term, tf] of termFrequencies(bag)) weights.set(term, tf * (idf.get(term) ?? 1))
  return weights
}

/**
 * Cosine of two sparse vectors; 0 when either has no magnitude.
 */
export function cosine(a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): number {
  let dot = 0
  let normA = 0
  let normB = 0
  for (const [term, value] of a) {
    dot += value * (b.get(term) ?? 0)
    normA += value * value
  }
  for (const value of b.values()) normB += value * value

  if (normA === 0 || normB === 0) return 0
  // Identical vectors can land a hair above 1 in floating point
  return Math.min(1, dot / Math.sqrt(normA * normB))
}

export function tfidfCosine(a: TokenBag, b: TokenBag): number {
  if (a.tokens.length === 0 || b.tokens.length === 0) return 0
  const idf = inverseDocumentFrequencies([a, b])
  return cosine(weigh(a, idf), weigh(b, idf))
}

/**
 * |A ∩ B| / |A ∪ B| over distinct tokens
 */
export function jaccard(a: TokenBag, b: TokenBag): number {
  if (a.distinct.size === 0 || b.distinct.size === 0) return 0
  let shared = 0
  for (const token of a.distinct) if (b.distinct.has(token)) shared++
  return shared / (a.distinct.size + b.distinct.size - shared)
}

export function tfidfCosineSimilarity(text1: string, text2: string): number {
  return tfidfCosine(toBag(text1), toBag(text2))
}

export function jaccardSimilarity(text1: string, text2: string): number {
  return jaccard(toBag(text1), toBag(text2))
}
