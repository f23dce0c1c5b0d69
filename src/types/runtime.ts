/**
 * Runtime shape supplied alongside (never inside) layer and hardware configs
 */
export interface RuntimeShape {
  readonly batchSize: number;
  readonly seqLen: number;
  readonly microBatch?: number;
  readonly tokensPerExpert?: number;
}
