/** A concept placed on the 2D visualization plane. */
export interface ProjectionPoint {
  conceptName: string;
  x: number;
  y: number;
}
