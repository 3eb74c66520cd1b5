import type { TestPointLayerMode } from "./config"

export type DiagnosticCategory = "DegradedGeometry" | "DimensionMismatch"

export type DiagnosticLevel = "info" | "warning" | "error"

/**
 * Non-fatal observation made while extracting geometry. Collected on the
 * context instead of being thrown; generation continues.
 */
export interface FixtureDiagnostic {
  category: DiagnosticCategory
  level: DiagnosticLevel
  message: string
}

export type FixtureErrorKind = "NoTestPointsFound" | "InvalidConfiguration"

export abstract class FixtureError extends Error {
  abstract readonly kind: FixtureErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class NoTestPointsFoundError extends FixtureError {
  readonly kind = "NoTestPointsFound"

  constructor(readonly mode: TestPointLayerMode) {
    super(describeMissingTestPoints(mode))
  }
}

export class InvalidConfigurationError extends FixtureError {
  readonly kind = "InvalidConfiguration"

  constructor(
    readonly field: string,
    readonly rawValue: unknown,
    reason = "expected a number",
  ) {
    super(`Invalid value for "${field}": ${JSON.stringify(rawValue)} (${reason})`)
  }
}

const describeMissingTestPoints = (mode: TestPointLayerMode): string => {
  const where =
    mode === "both"
      ? "on either side of the board (F.Cu and B.Cu)"
      : `on ${mode}`
  return `No test points found ${where}. Verify that the board has exposed pads without paste, or place pads on the force layer to include them.`
}
