/**
 * Exact EAN Strategy
 *
 * A shared valid barcode identifies the product outright.
 */

import type { SimilarityStrategy } from '../types'

export const ExactEanStrategy: SimilarityStrategy = {
  method: 'exact-ean',
  version: '1.0.0',

  score(input, candidate) {
    const eanMatch = input.ean !== null && candidate.ean !== null && input.ean === candidate.ean
    return {
      score: eanMatch ? 1 : 0,
      components: { eanMatch: eanMatch ? 1 : 0 },
    }
  },
}
