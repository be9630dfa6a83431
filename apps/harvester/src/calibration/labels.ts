/**
 * Human label CSV
 *
 * Columns: product_url, retailer, label_human, notes. Rows missing a URL,
 * retailer or label are skipped; an unknown label fails the whole file.
 */

import { parse as parseCSV } from 'csv-parse/sync'
import { z } from 'zod'
import { DealcheckError } from '@dealcheck/db'

export const HUMAN_LABELS = ['REAL', 'LIKELY_REAL', 'SUSPICIOUS', 'LIKELY_FAKE', 'FAKE'] as const
export type HumanLabel = (typeof HUMAN_LABELS)[number]

export const REQUIRED_COLUMNS = ['product_url', 'retailer', 'label_human', 'notes'] as const

export interface LabeledRow {
  productUrl: string
  retailer: string
  labelHuman: HumanLabel
  notes: string
}

export class CalibrationInputError extends DealcheckError {
  constructor(message: string) {
    super('CALIBRATION_INPUT_INVALID', message)
  }
}

const csvRowsSchema = z.array(z.record(z.string()))
const humanLabelSchema = z.enum(HUMAN_LABELS)

export function parseLabels(content: string): LabeledRow[] {
  const header = parseCSV(content, { to_line: 1, bom: true, trim: true })
  const columns = z.array(z.array(z.string())).parse(header)[0] ?? []
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column))
  if (missing.length > 0) {
    throw new CalibrationInputError(`Missing CSV columns: ${missing.join(', ')}`)
  }

  const records = csvRowsSchema.parse(
    parseCSV(content, { columns: true, skip_empty_lines: true, bom: true, trim: true, relax_column_count: true })
  )

  const rows: LabeledRow[] = []
  for (const record of records) {
    const productUrl = record.product_url?.trim() ?? ''
    const retailer = record.retailer?.trim() ?? ''
    const label = record.label_human?.trim().toUpperCase() ?? ''
    if (!productUrl || !retailer || !label) continue

    const parsed = humanLabelSchema.safeParse(label)
    if (!parsed.success) {
      throw new CalibrationInputError(`Invalid label_human '${label}' in row for ${productUrl}`)
    }

    rows.push({ productUrl, retailer, labelHuman: parsed.data, notes: record.notes?.trim() ?? '' })
  }
  return rows
}
