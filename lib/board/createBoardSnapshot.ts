import type {
  BoardSide,
  BoardSnapshot,
  BoundingBox,
  FootprintSnapshot,
  LayerId,
  PadSnapshot,
  PadType,
  Point,
} from "./types"

export interface PadData {
  position: Point
  padType: PadType
  layers: LayerId[]
  netName?: string
}

export interface FootprintData {
  reference: string
  side: BoardSide
  bounds: BoundingBox
  pads?: PadData[]
}

export interface BoardSnapshotData {
  nativeUnitsPerMm?: number
  outline?: BoundingBox[]
  footprints?: FootprintData[]
  revision?: string
}

/**
 * Build a BoardSnapshot from plain data, for hosts that already hold the
 * board in memory.
 *
 * Usage:
 * ```typescript
 * const board = createBoardSnapshot({
 *   outline: [{ x: 10, y: 5, width: 100, height: 50 }],
 *   footprints: [
 *     {
 *       reference: "TP1",
 *       side: "front",
 *       bounds: { x: 14, y: 6, width: 2, height: 2 },
 *       pads: [{ position: { x: 15, y: 7 }, padType: "smd", layers: ["F.Cu"] }],
 *     },
 *   ],
 * })
 * ```
 */
export function createBoardSnapshot(data: BoardSnapshotData): BoardSnapshot {
  const outline = (data.outline ?? []).map((bounds) => ({ bounds }))
  const footprints: FootprintSnapshot[] = (data.footprints ?? []).map(
    (footprint) => ({
      reference: footprint.reference,
      side: footprint.side,
      bounds: footprint.bounds,
      pads: (footprint.pads ?? []).map(createPadSnapshot),
    }),
  )

  return {
    nativeUnitsPerMm: data.nativeUnitsPerMm ?? 1,
    getOutlinePrimitives: () => outline,
    getFootprints: () => footprints,
    getTitleBlockRevision: () => data.revision,
  }
}

const createPadSnapshot = (pad: PadData): PadSnapshot => {
  const layers = new Set(pad.layers)
  return {
    position: pad.position,
    padType: pad.padType,
    netName: pad.netName ?? "",
    isOnLayer: (layer) => layers.has(layer),
  }
}
