import type { Queryable } from '../client'
import type { RawProductRepository } from '../store'
import { queryOne } from './query'
import { toRawProduct, type RawProductRow } from './rows'

const COLUMNS = `id, retailer_id, retailer_product_id, product_url, title, brand_raw, size_raw,
  category_raw, image_url, ean_raw, first_seen_at, last_seen_at`

export function createRawProductRepository(db: Queryable): RawProductRepository {
  return {
    async upsert(input) {
      // Listing attributes follow the latest sighting; first_seen_at never moves.
      const row = await queryOne<RawProductRow>(
        db,
        `INSERT INTO products_raw (
           retailer_id, retailer_product_id, product_url, title, brand_raw, size_raw,
           category_raw, image_url, ean_raw, first_seen_at, last_seen_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $10)
         ON CONFLICT (retailer_id, retailer_product_id) DO UPDATE SET
           product_url = EXCLUDED.product_url,
           title = EXCLUDED.title,
           brand_raw = EXCLUDED.brand_raw,
           size_raw = EXCLUDED.size_raw,
           category_raw = EXCLUDED.category_raw,
           image_url = EXCLUDED.image_url,
           ean_raw = EXCLUDED.ean_raw,
           last_seen_at = GREATEST(products_raw.last_seen_at, EXCLUDED.last_seen_at)
         RETURNING ${COLUMNS}`,
        [
          input.retailerId,
          input.retailerProductId,
          input.productUrl,
          input.title,
          input.brandRaw,
          input.sizeRaw,
          input.categoryRaw,
          input.imageUrl,
          input.eanRaw,
          input.seenAt,
        ]
      )
      if (!row) throw new Error(`Raw product upsert returned no row for ${input.retailerProductId}`)
      return toRawProduct(row)
    },

    async findById(id) {
      const row = await queryOne<RawProductRow>(db, `SELECT ${COLUMNS} FROM products_raw WHERE id = $1`, [id])
      return row ? toRawProduct(row) : null
    },
  }
}
