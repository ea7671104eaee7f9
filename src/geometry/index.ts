/**
 * Geometry engine: stateless numeric primitives
 */

export {
  toRadians,
  toDegrees,
  isValidPosition,
  sphericalDistance,
  geodeticToEcef,
} from "./spherical.js";

export {
  VisibilityScan,
  visibilityWindows,
  distanceConfidence,
  variance,
  type PlatformPositionFn,
  type VisibilityScanOptions,
} from "./visibility.js";

export {
  buildDesignMatrix,
  computeWeightMatrix,
  computeGdop,
  gdopFromWeights,
  pdopFromWeights,
  hdopFromWeights,
  vdopFromWeights,
  tdopFromWeights,
  classifyGeometry,
  geometryMetrics,
  type GdopResult,
  type GdopSuccess,
  type GdopFailure,
  type GdopOptions,
  type GeometryQuality,
  type GeometryMetrics,
  type WeightMatrix,
} from "./gdop.js";

export type { Matrix } from "./matrix.js";
