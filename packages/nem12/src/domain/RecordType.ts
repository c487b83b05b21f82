/**
 * NEM12 record indicators (the first field of every line).
 *
 * Only `200`, `300` and `900` drive the parser; the rest are read and ignored.
 */
export const RecordType = {
  HEADER: '100',
  NMI_DATA_DETAILS: '200',
  INTERVAL_DATA: '300',
  INTERVAL_EVENT: '400',
  B2B_DETAILS: '500',
  END_OF_DATA: '900',
} as const;

export type RecordType = (typeof RecordType)[keyof typeof RecordType];
