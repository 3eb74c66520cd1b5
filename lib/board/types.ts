/**
 * Read-only view of a board, as the fixture pipeline needs it.
 *
 * Host applications (a CAD plugin, a Circuit JSON document, a parsed board
 * file) implement this interface in an adapter. The pipeline only ever asks
 * for bounding boxes, layer membership, pad types and placement sides, so
 * differences between host API versions stay inside the adapter.
 */
export interface BoardSnapshot {
  /**
   * Native units per millimeter. Every position and bounding box returned by
   * the snapshot is expressed in native units (KiCad uses nanometers, so
   * 1_000_000; an adapter that already works in mm returns 1).
   */
  readonly nativeUnitsPerMm: number

  /**
   * Drawing primitives on the board's physical edge layer (Edge.Cuts).
   */
  getOutlinePrimitives(): readonly OutlinePrimitive[]

  getFootprints(): readonly FootprintSnapshot[]

  /**
   * Revision from the board's title block, when the host exposes one.
   */
  getTitleBlockRevision?(): string | undefined
}

export interface OutlinePrimitive {
  bounds: BoundingBox
}

export interface FootprintSnapshot {
  /** Reference designator, e.g. "J1" */
  reference: string
  side: BoardSide
  bounds: BoundingBox
  pads: readonly PadSnapshot[]
}

export interface PadSnapshot {
  /** Absolute position of the pad center, in native units */
  position: Point
  padType: PadType
  /** Only used to label diagnostics and debug output */
  netName: string
  isOnLayer(layer: LayerId): boolean
}

export interface Point {
  x: number
  y: number
}

/**
 * Axis-aligned box given by its minimum corner and size. Y grows downward,
 * so (x, y) is the top-left corner.
 */
export interface BoundingBox {
  x: number
  y: number
  width: number
  height: number
}

export type BoardSide = "front" | "back"

export type PadType = "smd" | "through_hole" | "other"

/**
 * Layer identifiers use KiCad's canonical layer names. Any string is accepted
 * so designers can point the force/ignore overrides at any user layer.
 */
export type LayerId = string

export const LAYERS = {
  frontCopper: "F.Cu",
  backCopper: "B.Cu",
  frontPaste: "F.Paste",
  backPaste: "B.Paste",
  ignoreDefault: "Eco1.User",
  forceDefault: "Eco2.User",
  edgeCuts: "Edge.Cuts",
} as const
