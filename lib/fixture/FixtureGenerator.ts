import { scale } from "transformation-matrix"
import type { BoardSnapshot } from "../board/types"
import {
  parseSelectionConfig,
  type FixtureHardwareConfig,
  type SelectionConfig,
} from "./config"
import type { FixtureDiagnostic } from "./errors"
import type { FixtureOutputPaths } from "./outputPaths"
import { AssembleParametersStage } from "./stages/AssembleParametersStage"
import { CollectBoardGeometryStage } from "./stages/CollectBoardGeometryStage"
import { CollectTestPointsStage } from "./stages/CollectTestPointsStage"
import type {
  FixtureContext,
  FixtureGeometry,
  FixtureParameters,
  FixtureStage,
} from "./types"

export interface FixtureGeneratorOptions {
  /** Unset or undefined fields keep their defaults */
  selection?: Partial<SelectionConfig>
  /**
   * Hardware config and output paths enable the assembly stage. Without them
   * the generator stops after collecting geometry and test points.
   */
  hardware?: FixtureHardwareConfig
  outputPaths?: FixtureOutputPaths
}

/**
 * Derives fixture parameters from a board snapshot.
 *
 * The generation is performed in stages:
 * 1. CollectBoardGeometryStage - Board origin, dimensions and sanity checks
 * 2. CollectTestPointsStage - Pad selection and coordinate normalization
 * 3. AssembleParametersStage - Named parameters for the geometry tool
 *
 * Usage:
 * ```typescript
 * const generator = new FixtureGenerator(board, { hardware, outputPaths })
 * generator.runUntilFinished()
 * const parameters = generator.getOutput()
 * ```
 */
export class FixtureGenerator {
  ctx: FixtureContext
  pipeline: FixtureStage[]
  currentStageIndex = 0
  finished = false

  get currentStage(): FixtureStage | undefined {
    return this.pipeline[this.currentStageIndex]
  }

  constructor(board: BoardSnapshot, options: FixtureGeneratorOptions = {}) {
    const unitsPerMm = board.nativeUnitsPerMm
    if (!(unitsPerMm > 0)) {
      throw new Error(`Invalid nativeUnitsPerMm: ${unitsPerMm}`)
    }

    this.ctx = {
      board,
      selection: parseSelectionConfig(options.selection),
      hardware: options.hardware,
      outputPaths: options.outputPaths,
      nativeToMmTransformMatrix: scale(1 / unitsPerMm, 1 / unitsPerMm),
      diagnostics: [],
    }

    this.pipeline = [
      new CollectBoardGeometryStage(this.ctx),
      new CollectTestPointsStage(this.ctx),
    ]
    if (options.hardware && options.outputPaths) {
      this.pipeline.push(new AssembleParametersStage(this.ctx))
    }
  }

  /**
   * Execute one step of the current stage.
   */
  step(): void {
    if (!this.currentStage) {
      this.finished = true
      return
    }

    this.currentStage.step()

    if (this.currentStage.finished) {
      this.currentStageIndex++
      if (this.currentStageIndex >= this.pipeline.length) {
        this.finished = true
      }
    }
  }

  runUntilFinished(): void {
    while (!this.finished) {
      this.step()
    }
  }

  getDiagnostics(): FixtureDiagnostic[] {
    return this.ctx.diagnostics
  }

  getGeometry(): FixtureGeometry {
    const {
      origin,
      dimensions,
      componentExtent,
      minY,
      testPointsTop,
      testPointsBottom,
    } = this.ctx
    if (
      !origin ||
      !dimensions ||
      !componentExtent ||
      minY === undefined ||
      !testPointsTop ||
      !testPointsBottom
    ) {
      throw new Error("Fixture geometry has not been generated yet")
    }

    return {
      origin,
      dimensions,
      componentExtent,
      minY,
      testPoints: [...testPointsTop, ...testPointsBottom],
      testPointsTop,
      testPointsBottom,
    }
  }

  getOutput(): FixtureParameters {
    if (!this.ctx.parameters) {
      throw new Error("Fixture parameters have not been assembled")
    }
    return this.ctx.parameters
  }
}

export interface FixtureGeometryResult {
  geometry: FixtureGeometry
  diagnostics: FixtureDiagnostic[]
}

/**
 * Compute board geometry and test points without assembling parameters.
 * An empty test point list is returned as is (minY = Infinity).
 */
export function generateFixtureGeometry(
  board: BoardSnapshot,
  selection?: Partial<SelectionConfig>,
): FixtureGeometryResult {
  const generator = new FixtureGenerator(board, { selection })
  generator.runUntilFinished()
  return {
    geometry: generator.getGeometry(),
    diagnostics: generator.getDiagnostics(),
  }
}

export interface FixtureParametersResult extends FixtureGeometryResult {
  parameters: FixtureParameters
}

/**
 * Run the whole pipeline. Throws NoTestPointsFoundError before assembly
 * when no pad qualifies.
 */
export function generateFixtureParameters(
  board: BoardSnapshot,
  options: FixtureGeneratorOptions & {
    hardware: FixtureHardwareConfig
    outputPaths: FixtureOutputPaths
  },
): FixtureParametersResult {
  const generator = new FixtureGenerator(board, options)
  generator.runUntilFinished()
  return {
    geometry: generator.getGeometry(),
    diagnostics: generator.getDiagnostics(),
    parameters: generator.getOutput(),
  }
}
