export type FieldValue = string | number;

/** One product as rendered by the portal: field name to cell/card text. */
export type ProductRecord = Record<string, FieldValue>;

export interface ExtractionResult {
  capturedAt: Date;
  records: ProductRecord[];
}
