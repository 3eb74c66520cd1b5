import { formatFixed2 } from "./round"
import type { FixtureGeometry, SelectedTestPoint } from "./types"

/**
 * One-line summary, e.g.
 * `Fixture: origin=(10.00,5.00) dims=(100.00,50.00) min_y=2.01`
 */
export const describeFixtureGeometry = (geometry: FixtureGeometry): string =>
  `Fixture: origin=(${formatFixed2(geometry.origin.x)},${formatFixed2(geometry.origin.y)}) ` +
  `dims=(${formatFixed2(geometry.dimensions.width)},${formatFixed2(geometry.dimensions.height)}) ` +
  `min_y=${formatMinY(geometry.minY)}`

/**
 * `TP[<net>] = (x, y)`, one line per test point
 */
export const describeTestPoint = (testPoint: SelectedTestPoint): string =>
  `TP[${testPoint.netName}] = (${formatFixed2(testPoint.position.x)}, ${formatFixed2(testPoint.position.y)})`

const formatMinY = (minY: number): string =>
  Number.isFinite(minY) ? formatFixed2(minY) : "none"
