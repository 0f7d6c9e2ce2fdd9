/** One provider response collected during an ensemble run. */
export interface SubResult {
  model: string;
  prompt_variant: string;
  score: number;
  explanation: string;
  confidence: number;
  raw_response: string;
}

export interface ModelAggregation {
  mean: number;
  weighted_mean: number;
  variance: number;
  count: number;
  sum_confidence: number;
}

export interface FinalAggregation {
  weighted_mean: number;
  variance: number;
  uncertainty_flag: boolean;
  total_weight: number;
}

/** Metadata of the synthetic "ensemble" ModelScore. */
export interface EnsembleMetadata {
  confidence: number;
  all_sub_results: SubResult[];
  per_model_results: Record<string, SubResult[]>;
  per_model_aggregation: Record<string, ModelAggregation>;
  final_aggregation: FinalAggregation;
  timestamp: string;
}

/** Metadata of one model's ModelScore (cached per content hash). */
export interface ModelScoreMetadata {
  confidence: number;
  explanation: string;
  aggregation: ModelAggregation;
  sub_results: SubResult[];
  valid_results: SubResult[];
}
