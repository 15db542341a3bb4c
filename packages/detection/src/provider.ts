/**
 * Classification collaborators.
 *
 * The aggregator only needs a label per detection; how a label is
 * produced from a feature vector or an image crop is up to these.
 */

/** Maps a feature vector to a vehicle label (e.g. "car", "ambulance") */
export interface VehicleClassifier {
  /** Human-readable name */
  readonly name: string;
  classify(embedding: readonly number[]): Promise<string>;
}

/** Turns an encoded image crop into a feature vector */
export interface ImageEmbedder {
  /** Human-readable name */
  readonly name: string;
  embed(image: Buffer): Promise<number[]>;
}
