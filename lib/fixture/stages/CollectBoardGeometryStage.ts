import { transformBoundingBox } from "../../board/bounds"
import type { BoundingBox, Point } from "../../board/types"
import { GRID_MM, formatFixed2, roundTo } from "../round"
import { FixtureStage, type Dimensions } from "../types"

/** Footprints may stick out this far past the outline before we warn (mm) */
export const COMPONENT_OVERHANG_TOLERANCE_MM = 0.5
export const MIN_BOARD_DIMENSION_MM = 10
export const MAX_BOARD_DIMENSION_MM = 500

export interface Extents {
  min: Point
  max: Point
}

/**
 * CollectBoardGeometryStage computes the board origin and dimensions.
 *
 * 1. The origin is the per-axis minimum over the bounding boxes of every
 *    Edge.Cuts primitive, the far corner is the per-axis maximum of
 *    (x + width, y + height). Dimensions are snapped to the 0.01mm grid.
 * 2. Without a usable outline, the union of footprint bounding boxes is used
 *    instead and a DegradedGeometry diagnostic is recorded.
 * 3. The footprint extent measured from the same origin is compared against
 *    the outline; connectors and mounting tabs that overhang the edge by more
 *    than COMPONENT_OVERHANG_TOLERANCE_MM are reported.
 * 4. Implausibly small or large boards are reported.
 *
 * Nothing here throws: a board without any geometry ends up with zero
 * dimensions and no test points, which the assembly stage rejects.
 */
export class CollectBoardGeometryStage extends FixtureStage {
  step(): void {
    const { board, nativeToMmTransformMatrix } = this.ctx

    const outlineBoxes = board
      .getOutlinePrimitives()
      .map((primitive) =>
        transformBoundingBox(primitive.bounds, nativeToMmTransformMatrix),
      )
    const footprintBoxes = board
      .getFootprints()
      .map((footprint) =>
        transformBoundingBox(footprint.bounds, nativeToMmTransformMatrix),
      )

    const outlineExtents = computeExtents(outlineBoxes)
    const footprintExtents = computeExtents(footprintBoxes)

    let boardExtents: Extents | null = outlineExtents
    if (!outlineExtents || !hasArea(outlineExtents)) {
      boardExtents = footprintExtents
      this.ctx.diagnostics.push({
        category: "DegradedGeometry",
        level: "warning",
        message:
          outlineBoxes.length === 0
            ? "No Edge.Cuts primitives found, board size estimated from footprint bounding boxes"
            : "Edge.Cuts primitives have no area, board size estimated from footprint bounding boxes",
      })
    }

    const origin: Point = boardExtents
      ? { ...boardExtents.min }
      : { x: 0, y: 0 }
    const dimensions = boardExtents
      ? measureFrom(origin, boardExtents.max)
      : { width: 0, height: 0 }
    const componentExtent = footprintExtents
      ? measureFrom(origin, footprintExtents.max)
      : { width: 0, height: 0 }

    this.checkComponentOverhang(dimensions, componentExtent)
    this.checkPlausibleSize(dimensions)

    this.ctx.origin = origin
    this.ctx.dimensions = dimensions
    this.ctx.componentExtent = componentExtent

    this.finished = true
  }

  private checkComponentOverhang(
    dimensions: Dimensions,
    componentExtent: Dimensions,
  ): void {
    const overhangX = componentExtent.width - dimensions.width
    const overhangY = componentExtent.height - dimensions.height
    if (
      overhangX <= COMPONENT_OVERHANG_TOLERANCE_MM &&
      overhangY <= COMPONENT_OVERHANG_TOLERANCE_MM
    ) {
      return
    }

    this.ctx.diagnostics.push({
      category: "DimensionMismatch",
      level: "warning",
      message: `Components extend past the board outline: footprints span ${formatSize(componentExtent)}mm, outline is ${formatSize(dimensions)}mm`,
    })
  }

  private checkPlausibleSize(dimensions: Dimensions): void {
    const size = formatSize(dimensions)
    if (
      dimensions.width < MIN_BOARD_DIMENSION_MM ||
      dimensions.height < MIN_BOARD_DIMENSION_MM
    ) {
      this.ctx.diagnostics.push({
        category: "DimensionMismatch",
        level: "error",
        message: `Board is ${size}mm, smaller than the ${MIN_BOARD_DIMENSION_MM}mm minimum`,
      })
    } else if (
      dimensions.width > MAX_BOARD_DIMENSION_MM ||
      dimensions.height > MAX_BOARD_DIMENSION_MM
    ) {
      this.ctx.diagnostics.push({
        category: "DimensionMismatch",
        level: "warning",
        message: `Board is ${size}mm, larger than the ${MAX_BOARD_DIMENSION_MM}mm maximum`,
      })
    }
  }
}

/**
 * Per-axis minimum corner and maximum far corner over all boxes, or null
 * when there are none. Independent of box order.
 */
export const computeExtents = (
  boxes: readonly BoundingBox[],
): Extents | null => {
  if (boxes.length === 0) return null

  return boxes.reduce<Extents>(
    (acc, box) => ({
      min: {
        x: Math.min(acc.min.x, box.x),
        y: Math.min(acc.min.y, box.y),
      },
      max: {
        x: Math.max(acc.max.x, box.x + box.width),
        y: Math.max(acc.max.y, box.y + box.height),
      },
    }),
    {
      min: { x: Infinity, y: Infinity },
      max: { x: -Infinity, y: -Infinity },
    },
  )
}

const hasArea = (extents: Extents): boolean =>
  extents.max.x > extents.min.x && extents.max.y > extents.min.y

const measureFrom = (origin: Point, max: Point): Dimensions => ({
  width: roundTo(GRID_MM, max.x - origin.x),
  height: roundTo(GRID_MM, max.y - origin.y),
})

const formatSize = (dimensions: Dimensions): string =>
  `${formatFixed2(dimensions.width)}x${formatFixed2(dimensions.height)}`
