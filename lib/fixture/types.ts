import type { Matrix } from "transformation-matrix"
import type {
  BoardSide,
  BoardSnapshot,
  LayerId,
  Point,
} from "../board/types"
import type { FixtureHardwareConfig, SelectionConfig } from "./config"
import type { FixtureDiagnostic } from "./errors"
import type { FixtureOutputPaths } from "./outputPaths"

export interface Dimensions {
  width: number
  height: number
}

/**
 * One face of the board being scanned for test points, with the layers and
 * mirror direction that go with it.
 */
export interface ScanSide {
  side: BoardSide
  copperLayer: LayerId
  pasteLayer: LayerId
  /** Back side points are seen through the board, so X is flipped */
  mirror: boolean
}

export interface SelectedTestPoint {
  /** Fixture-local position in mm, relative to the board origin */
  position: Point
  side: BoardSide
  netName: string
  footprintReference: string
}

/**
 * Everything derived from one board snapshot. Built once per run.
 */
export interface FixtureGeometry {
  /** Top-left corner of the board in board space (mm) */
  origin: Point
  dimensions: Dimensions
  /** Footprint-derived extent, only used for the overhang check */
  componentExtent: Dimensions
  /** Smallest local Y among all test points, Infinity when there are none */
  minY: number
  testPoints: SelectedTestPoint[]
  testPointsTop: SelectedTestPoint[]
  testPointsBottom: SelectedTestPoint[]
}

/**
 * Named parameter literals for the geometry tool, in insertion order.
 */
export type FixtureParameters = Record<string, string>

/**
 * Context object shared between all fixture stages.
 */
export interface FixtureContext {
  board: BoardSnapshot

  selection: SelectionConfig

  /**
   * Hardware dimensions and output paths, only needed for assembly. A run
   * that only computes geometry leaves them unset.
   */
  hardware?: FixtureHardwareConfig
  outputPaths?: FixtureOutputPaths

  /**
   * Native board units to millimeters.
   */
  nativeToMmTransformMatrix: Matrix

  /**
   * Populated by CollectBoardGeometryStage
   */
  origin?: Point
  dimensions?: Dimensions
  componentExtent?: Dimensions

  /**
   * Populated by CollectTestPointsStage
   */
  testPointsTop?: SelectedTestPoint[]
  testPointsBottom?: SelectedTestPoint[]
  minY?: number

  /**
   * Populated by AssembleParametersStage
   */
  parameters?: FixtureParameters

  diagnostics: FixtureDiagnostic[]
}

/**
 * Abstract base class for fixture stages. Each stage reads what earlier stages
 * left on the context and adds its own results, setting `finished` once done.
 */
export abstract class FixtureStage {
  finished = false

  protected ctx: FixtureContext

  constructor(ctx: FixtureContext) {
    this.ctx = ctx
  }

  /**
   * Execute one step of the stage.
   */
  abstract step(): void

  runUntilFinished(): void {
    while (!this.finished) {
      this.step()
    }
  }
}
