export interface Thresholds {
  readonly aggression: number;
  readonly harassment: number;
  readonly threat: number;
  readonly coerciveAuthority: number;
  readonly condescension: number;
  /** Cosine similarity against the threat phrase list that counts as an implicit threat. */
  readonly implicitThreat: number;
  /** Cosine similarity against recent messages that counts as quoting. */
  readonly quote: number;
  /** Coercive score below which a stated willingness to comply is accepted as reasonable. */
  readonly complianceCeiling: number;
}

export const DEFAULT_THRESHOLDS: Thresholds = {
  aggression: 0.5,
  harassment: 0.5,
  threat: 0.5,
  coerciveAuthority: 0.5,
  condescension: 0.3,
  implicitThreat: 0.72,
  quote: 0.9,
  complianceCeiling: 0.8,
};
