import type { Point } from "../../board/types"
import {
  createBoardToLocalMatrix,
  createMirrorMatrix,
  normalizeTestPoint,
} from "../normalizeTestPoint"
import { getScanSides, selectTestPoint } from "../selectTestPoint"
import { FixtureStage, type ScanSide, type SelectedTestPoint } from "../types"

/**
 * CollectTestPointsStage scans every pad of every footprint, once per board
 * side selected by `selection.testPointLayer`, and keeps the pads that
 * qualify as test points in fixture-local coordinates.
 *
 * In "both" mode the front side is scanned first, so the merged list is
 * always the top points followed by the bottom points.
 *
 * An empty result is not an error here: minY stays Infinity and the assembly
 * stage reports it.
 */
export class CollectTestPointsStage extends FixtureStage {
  step(): void {
    const { origin, dimensions } = this.ctx
    if (!origin || !dimensions) {
      throw new Error("Board geometry not collected")
    }

    const boardToLocal = createBoardToLocalMatrix(
      this.ctx.nativeToMmTransformMatrix,
      origin,
    )
    const mirror = createMirrorMatrix(dimensions)

    const top: SelectedTestPoint[] = []
    const bottom: SelectedTestPoint[] = []

    for (const scan of getScanSides(this.ctx.selection.testPointLayer)) {
      const found = this.scanSide(scan, (position) =>
        normalizeTestPoint(position, boardToLocal, scan.mirror ? mirror : null),
      )
      if (scan.side === "front") {
        top.push(...found)
      } else {
        bottom.push(...found)
      }
    }

    this.ctx.testPointsTop = top
    this.ctx.testPointsBottom = bottom
    this.ctx.minY = [...top, ...bottom].reduce(
      (min, testPoint) => Math.min(min, testPoint.position.y),
      Infinity,
    )

    this.finished = true
  }

  private scanSide(
    scan: ScanSide,
    toLocal: (position: Point) => Point,
  ): SelectedTestPoint[] {
    const found: SelectedTestPoint[] = []

    for (const footprint of this.ctx.board.getFootprints()) {
      for (const pad of footprint.pads) {
        const verdict = selectTestPoint(pad, footprint, scan, this.ctx.selection)
        if (!verdict.accepted) continue

        found.push({
          position: toLocal(pad.position),
          side: scan.side,
          netName: pad.netName,
          footprintReference: footprint.reference,
        })
      }
    }

    return found
  }
}
