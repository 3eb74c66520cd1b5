import {
  applyToPoint,
  compose,
  scale,
  translate,
  type Matrix,
} from "transformation-matrix"
import type { Point } from "../board/types"
import { GRID_MM, roundTo } from "./round"
import type { Dimensions } from "./types"

/**
 * Board space (native units) to origin-relative millimeters.
 */
export const createBoardToLocalMatrix = (
  nativeToMm: Matrix,
  origin: Point,
): Matrix => compose(translate(-origin.x, -origin.y), nativeToMm)

/**
 * Flip X about the board width.
 */
export const createMirrorMatrix = (dimensions: Dimensions): Matrix =>
  compose(translate(dimensions.width, 0), scale(-1, 1))

/**
 * Map a pad position into fixture-local coordinates.
 *
 * The origin-relative position is snapped to the 0.01mm grid first; for the
 * back side the snapped X is then mirrored about the board width. Mirroring
 * after rounding (not before) is what the fixture model was tuned against.
 */
export function normalizeTestPoint(
  position: Point,
  boardToLocal: Matrix,
  mirror: Matrix | null,
): Point {
  const relative = applyToPoint(boardToLocal, position)
  const snapped = {
    x: roundTo(GRID_MM, relative.x),
    y: roundTo(GRID_MM, relative.y),
  }
  if (!mirror) return snapped

  return { x: applyToPoint(mirror, snapped).x, y: snapped.y }
}
