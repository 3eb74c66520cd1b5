import { LAYERS, type LayerId } from "../board/types"
import { InvalidConfigurationError } from "./errors"

export type TestPointLayerMode = "F.Cu" | "B.Cu" | "both"

/**
 * Which pads qualify as test points.
 */
export interface SelectionConfig {
  testPointLayer: TestPointLayerMode
  /** Pads that also sit on this layer are always accepted */
  forceLayer: LayerId
  /** Pads that also sit on this layer are rejected (unless forced) */
  ignoreLayer: LayerId
  includeSmd: boolean
  includeThroughHole: boolean
}

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  testPointLayer: "F.Cu",
  forceLayer: LAYERS.forceDefault,
  ignoreLayer: LAYERS.ignoreDefault,
  includeSmd: true,
  includeThroughHole: false,
}

export interface LogoConfig {
  file: string
  scale?: number
}

/**
 * Fixture hardware dimensions, all in millimeters.
 */
export interface FixtureHardwareConfig {
  /** Thickness of the laser cut sheet material */
  materialThickness: number
  pcbThickness: number
  screwLength: number
  screwDiameter: number
  washerThickness?: number
  nutFlatToFlat?: number
  nutCornerToCorner?: number
  nutThickness?: number
  pivotDiameter?: number
  /** Width of the ledge supporting the PCB */
  supportBorder?: number
  pogoUncompressedLength?: number
  revision?: string
  logo?: LogoConfig
}

export const DEFAULT_PCB_THICKNESS = 1.6
export const DEFAULT_SCREW_LENGTH = 14
export const DEFAULT_SCREW_DIAMETER = 3.0

/**
 * Hardware config as it arrives from flags, a config file or a form:
 * numbers may still be strings.
 */
export interface RawFixtureHardwareConfig {
  materialThickness?: unknown
  pcbThickness?: unknown
  screwLength?: unknown
  screwDiameter?: unknown
  washerThickness?: unknown
  nutFlatToFlat?: unknown
  nutCornerToCorner?: unknown
  nutThickness?: unknown
  pivotDiameter?: unknown
  supportBorder?: unknown
  pogoUncompressedLength?: unknown
  revision?: unknown
  logo?: { file?: unknown; scale?: unknown }
}

export type RawSelectionConfig = {
  [K in keyof SelectionConfig]?: unknown
}

/**
 * Resolve and validate hardware dimensions. Throws InvalidConfigurationError
 * for the first missing required value or unparsable number.
 */
export function parseFixtureConfig(
  raw: RawFixtureHardwareConfig,
): FixtureHardwareConfig {
  const materialThickness = parseDimension("materialThickness", raw.materialThickness)
  if (materialThickness === undefined) {
    throw new InvalidConfigurationError(
      "materialThickness",
      raw.materialThickness,
      "required",
    )
  }

  const config: FixtureHardwareConfig = {
    materialThickness,
    pcbThickness:
      parseDimension("pcbThickness", raw.pcbThickness) ?? DEFAULT_PCB_THICKNESS,
    screwLength:
      parseDimension("screwLength", raw.screwLength) ?? DEFAULT_SCREW_LENGTH,
    screwDiameter:
      parseDimension("screwDiameter", raw.screwDiameter) ??
      DEFAULT_SCREW_DIAMETER,
    washerThickness: parseDimension("washerThickness", raw.washerThickness),
    nutFlatToFlat: parseDimension("nutFlatToFlat", raw.nutFlatToFlat),
    nutCornerToCorner: parseDimension("nutCornerToCorner", raw.nutCornerToCorner),
    nutThickness: parseDimension("nutThickness", raw.nutThickness),
    pivotDiameter: parseDimension("pivotDiameter", raw.pivotDiameter),
    supportBorder: parseDimension("supportBorder", raw.supportBorder),
    pogoUncompressedLength: parseDimension(
      "pogoUncompressedLength",
      raw.pogoUncompressedLength,
    ),
    revision: parseText("revision", raw.revision),
  }

  if (raw.logo !== undefined) {
    const file = parseText("logo.file", raw.logo.file)
    if (file === undefined) {
      throw new InvalidConfigurationError("logo.file", raw.logo.file, "required")
    }
    config.logo = { file, scale: parseDimension("logo.scale", raw.logo.scale) }
  }

  return config
}

export function parseSelectionConfig(raw: RawSelectionConfig = {}): SelectionConfig {
  let testPointLayer = DEFAULT_SELECTION_CONFIG.testPointLayer
  if (raw.testPointLayer !== undefined) {
    if (!isTestPointLayerMode(raw.testPointLayer)) {
      throw new InvalidConfigurationError(
        "testPointLayer",
        raw.testPointLayer,
        'expected "F.Cu", "B.Cu" or "both"',
      )
    }
    testPointLayer = raw.testPointLayer
  }

  return {
    testPointLayer,
    forceLayer:
      parseText("forceLayer", raw.forceLayer) ??
      DEFAULT_SELECTION_CONFIG.forceLayer,
    ignoreLayer:
      parseText("ignoreLayer", raw.ignoreLayer) ??
      DEFAULT_SELECTION_CONFIG.ignoreLayer,
    includeSmd:
      parseFlag("includeSmd", raw.includeSmd) ??
      DEFAULT_SELECTION_CONFIG.includeSmd,
    includeThroughHole:
      parseFlag("includeThroughHole", raw.includeThroughHole) ??
      DEFAULT_SELECTION_CONFIG.includeThroughHole,
  }
}

const isTestPointLayerMode = (value: unknown): value is TestPointLayerMode =>
  value === "F.Cu" || value === "B.Cu" || value === "both"

/**
 * Parse a positive length. Empty values count as "not set".
 */
const parseDimension = (field: string, value: unknown): number | undefined => {
  if (value === undefined || value === null) return undefined

  let parsed: number
  if (typeof value === "number") {
    parsed = value
  } else if (typeof value === "string") {
    const trimmed = value.trim()
    if (trimmed === "") return undefined
    parsed = Number(trimmed)
  } else {
    throw new InvalidConfigurationError(field, value)
  }

  if (!Number.isFinite(parsed)) {
    throw new InvalidConfigurationError(field, value)
  }
  if (parsed <= 0) {
    throw new InvalidConfigurationError(field, value, "must be greater than 0")
  }
  return parsed
}

const parseText = (field: string, value: unknown): string | undefined => {
  if (value === undefined || value === null) return undefined
  if (typeof value === "number") return String(value)
  if (typeof value !== "string") {
    throw new InvalidConfigurationError(field, value, "expected a string")
  }
  return value.trim() === "" ? undefined : value
}

const parseFlag = (field: string, value: unknown): boolean | undefined => {
  if (value === undefined || value === null) return undefined
  if (typeof value === "boolean") return value
  if (value === "true" || value === "1") return true
  if (value === "false" || value === "0") return false
  throw new InvalidConfigurationError(field, value, "expected a boolean")
}
