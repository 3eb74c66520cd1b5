export type {
  BoardSide,
  BoardSnapshot,
  BoundingBox,
  FootprintSnapshot,
  LayerId,
  OutlinePrimitive,
  PadSnapshot,
  PadType,
  Point,
} from "./board/types"
export { LAYERS } from "./board/types"
export {
  createBoardSnapshot,
  type BoardSnapshotData,
  type FootprintData,
  type PadData,
} from "./board/createBoardSnapshot"
export {
  CircuitJsonBoardSnapshot,
  createBoardSnapshotFromCircuitJson,
  type CircuitJsonBoardSnapshotOptions,
} from "./board/circuit-json/CircuitJsonBoardSnapshot"

export {
  FixtureGenerator,
  generateFixtureGeometry,
  generateFixtureParameters,
  type FixtureGeneratorOptions,
  type FixtureGeometryResult,
  type FixtureParametersResult,
} from "./fixture/FixtureGenerator"
export {
  DEFAULT_SELECTION_CONFIG,
  parseFixtureConfig,
  parseSelectionConfig,
  type FixtureHardwareConfig,
  type LogoConfig,
  type RawFixtureHardwareConfig,
  type RawSelectionConfig,
  type SelectionConfig,
  type TestPointLayerMode,
} from "./fixture/config"
export {
  FixtureError,
  InvalidConfigurationError,
  NoTestPointsFoundError,
  type DiagnosticCategory,
  type DiagnosticLevel,
  type FixtureDiagnostic,
} from "./fixture/errors"
export {
  getFixtureOutputPaths,
  type FixtureOutputPaths,
  type TrackDrawingPaths,
} from "./fixture/outputPaths"
export { selectTestPoint, type TestPointVerdict } from "./fixture/selectTestPoint"
export { normalizeTestPoint } from "./fixture/normalizeTestPoint"
export { roundTo, roundHalfEven, formatFixed2 } from "./fixture/round"
export { FixtureParameterBuilder } from "./fixture/FixtureParameterBuilder"
export {
  formatDefineArguments,
  type GeometryToolMode,
} from "./fixture/formatDefineArguments"
export {
  describeFixtureGeometry,
  describeTestPoint,
} from "./fixture/describeFixtureGeometry"
export type {
  Dimensions,
  FixtureContext,
  FixtureGeometry,
  FixtureParameters,
  ScanSide,
  SelectedTestPoint,
} from "./fixture/types"
