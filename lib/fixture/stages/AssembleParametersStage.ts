import { NoTestPointsFoundError } from "../errors"
import { FixtureParameterBuilder } from "../FixtureParameterBuilder"
import { FixtureStage } from "../types"

/**
 * AssembleParametersStage turns the collected geometry, the hardware config
 * and the drawing paths into the named parameters of the geometry tool.
 *
 * Parameters:
 *   test_points              [[x,y],...] (merged list)
 *   test_points_top/_bottom  per-side lists, "both" mode only
 *   tp_min_y                 smallest test point Y
 *   mat_th, pcb_th           sheet and board thickness
 *   pcb_x, pcb_y             board dimensions
 *   pcb_outline, pcb_track   exported drawings (pcb_track_top/_bottom when split)
 *   screw_thr_len, screw_d
 *   rev                      always set, "rev.0" when nothing better is known
 *   washer_th, nut_od_f2f, nut_od_c2c, nut_th, pivot_d, pcb_support_border,
 *   pogo_uncompressed_length, logo_file, logo_scale   only when configured
 */
export class AssembleParametersStage extends FixtureStage {
  step(): void {
    const {
      dimensions,
      testPointsTop,
      testPointsBottom,
      minY,
      hardware,
      outputPaths,
      selection,
    } = this.ctx

    if (!dimensions || !testPointsTop || !testPointsBottom || minY === undefined) {
      throw new Error("Test points not collected")
    }
    if (!hardware || !outputPaths) {
      throw new Error("Hardware config and output paths are required for assembly")
    }

    const testPoints = [...testPointsTop, ...testPointsBottom]
    if (testPoints.length === 0) {
      throw new NoTestPointsFoundError(selection.testPointLayer)
    }

    const params = new FixtureParameterBuilder()

    if (selection.testPointLayer === "both") {
      params
        .points("test_points_top", testPointsTop.map((tp) => tp.position))
        .points("test_points_bottom", testPointsBottom.map((tp) => tp.position))
    }

    params
      .points("test_points", testPoints.map((tp) => tp.position))
      .number("tp_min_y", minY)
      .number("mat_th", hardware.materialThickness)
      .number("pcb_th", hardware.pcbThickness)
      .number("pcb_x", dimensions.width)
      .number("pcb_y", dimensions.height)
      .string("pcb_outline", outputPaths.outline)
      .number("screw_thr_len", hardware.screwLength)
      .number("screw_d", hardware.screwDiameter)

    const { tracks } = outputPaths
    if (tracks.kind === "split") {
      params
        .string("pcb_track_top", tracks.trackTop)
        .string("pcb_track_bottom", tracks.trackBottom)
    } else {
      params.string("pcb_track", tracks.track)
    }

    params
      .string("rev", hardware.revision ?? this.getBoardRevision())
      .optionalNumber("washer_th", hardware.washerThickness)
      .optionalNumber("nut_od_f2f", hardware.nutFlatToFlat)
      .optionalNumber("nut_od_c2c", hardware.nutCornerToCorner)
      .optionalNumber("nut_th", hardware.nutThickness)
      .optionalNumber("pivot_d", hardware.pivotDiameter)
      .optionalNumber("pcb_support_border", hardware.supportBorder)
      .optionalNumber("pogo_uncompressed_length", hardware.pogoUncompressedLength)
      .optionalString("logo_file", hardware.logo?.file)
      .optionalNumber("logo_scale", hardware.logo?.scale)

    this.ctx.parameters = params.build()

    this.finished = true
  }

  private getBoardRevision(): string {
    const revision = this.ctx.board.getTitleBlockRevision?.()?.trim()
    return revision ? `rev.${revision}` : "rev.0"
  }
}
