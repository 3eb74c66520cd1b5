import type { Point } from "../board/types"
import { InvalidConfigurationError } from "./errors"
import { formatFixed2 } from "./round"
import type { FixtureParameters } from "./types"

/**
 * Collects parameter literals in insertion order.
 *
 * Numbers are written bare with two decimals, point lists as
 * `[[x,y],[x,y]]` and strings double-quoted. Optional values that are
 * undefined are skipped entirely so the geometry tool keeps its defaults.
 */
export class FixtureParameterBuilder {
  private entries = new Map<string, string>()

  number(name: string, value: number): this {
    if (!Number.isFinite(value)) {
      throw new InvalidConfigurationError(name, value, "expected a finite number")
    }
    this.entries.set(name, formatFixed2(value))
    return this
  }

  optionalNumber(name: string, value: number | undefined): this {
    return value === undefined ? this : this.number(name, value)
  }

  points(name: string, points: readonly Point[]): this {
    this.entries.set(name, formatPointList(points))
    return this
  }

  string(name: string, value: string): this {
    this.entries.set(name, quoteString(value))
    return this
  }

  optionalString(name: string, value: string | undefined): this {
    return value === undefined ? this : this.string(name, value)
  }

  build(): FixtureParameters {
    return Object.fromEntries(this.entries)
  }
}

export const formatPointList = (points: readonly Point[]): string =>
  `[${points
    .map((point) => `[${formatFixed2(point.x)},${formatFixed2(point.y)}]`)
    .join(",")}]`

export const quoteString = (value: string): string =>
  `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`
