import { applyToPoint, type Matrix } from "transformation-matrix"
import type { BoundingBox, Point } from "./types"

/**
 * Transform a box through `matrix`. Both corners are mapped so the result is
 * still a min-corner box when the matrix flips an axis.
 */
export const transformBoundingBox = (
  box: BoundingBox,
  matrix: Matrix,
): BoundingBox => {
  const a = applyToPoint(matrix, { x: box.x, y: box.y })
  const b = applyToPoint(matrix, {
    x: box.x + box.width,
    y: box.y + box.height,
  })
  return boundingBoxOfPoints([a, b])
}

/**
 * Smallest box containing every point. Expects at least one point.
 */
export const boundingBoxOfPoints = (points: readonly Point[]): BoundingBox => {
  const xs = points.map((p) => p.x)
  const ys = points.map((p) => p.y)
  const minX = Math.min(...xs)
  const minY = Math.min(...ys)
  return {
    x: minX,
    y: minY,
    width: Math.max(...xs) - minX,
    height: Math.max(...ys) - minY,
  }
}

export const boundingBoxFromCenter = (
  center: Point,
  width: number,
  height: number,
): BoundingBox => ({
  x: center.x - width / 2,
  y: center.y - height / 2,
  width,
  height,
})
