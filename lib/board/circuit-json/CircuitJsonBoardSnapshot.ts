import { cju, type CircuitJsonUtilObjects } from "@tscircuit/circuit-json-util"
import type { CircuitJson, LayerRef, PcbBoard, PcbComponent } from "circuit-json"
import {
  applyToPoint,
  scale,
  type Matrix,
} from "transformation-matrix"
import {
  boundingBoxFromCenter,
  boundingBoxOfPoints,
  transformBoundingBox,
} from "../bounds"
import {
  LAYERS,
  type BoardSnapshot,
  type FootprintSnapshot,
  type LayerId,
  type OutlinePrimitive,
  type PadSnapshot,
  type Point,
} from "../types"

export interface CircuitJsonBoardSnapshotOptions {
  /**
   * Extra layers per pad, keyed by pcb_smtpad_id or pcb_plated_hole_id.
   * Circuit JSON has no user layers, so this is how pads are put on the
   * force or ignore layer.
   */
  padLayers?: Record<string, LayerId[]>
  revision?: string
}

/** Solder paste closer than this to a pad center belongs to the pad (mm) */
const PASTE_MATCH_TOLERANCE = 1e-6

/**
 * Circuit JSON is Y-up with millimeter units; the fixture pipeline expects a
 * Y-down board frame (top-left origin), so every coordinate is flipped.
 */
const CIRCUIT_JSON_TO_BOARD_MATRIX: Matrix = scale(1, -1)

const COPPER_LAYER_BY_REF: Partial<Record<LayerRef, LayerId>> = {
  top: LAYERS.frontCopper,
  bottom: LAYERS.backCopper,
}

const PASTE_LAYER_BY_REF: Partial<Record<LayerRef, LayerId>> = {
  top: LAYERS.frontPaste,
  bottom: LAYERS.backPaste,
}

interface PastePosition {
  layer: LayerRef
  center: Point
}

/**
 * Exposes a Circuit JSON document through the BoardSnapshot interface.
 *
 * - pcb_board outlines become one Edge.Cuts primitive per outline segment
 *   (or four edges of the width/height rectangle when there is no outline)
 * - pcb_component elements become footprints; their pcb_smtpad (SMD) and
 *   pcb_plated_hole (through-hole) elements become pads
 * - a pcb_solder_paste element centered on a pad puts the pad on the paste
 *   layer of that side
 * - pad net names are resolved through pcb_port -> source_trace -> source_net
 *
 * Pads that belong to no pcb_component each get a zero-size front footprint
 * of their own.
 */
export class CircuitJsonBoardSnapshot implements BoardSnapshot {
  readonly nativeUnitsPerMm = 1

  private outline: OutlinePrimitive[]
  private footprints: FootprintSnapshot[]

  constructor(
    circuitJson: CircuitJson,
    private options: CircuitJsonBoardSnapshotOptions = {},
  ) {
    const db = cju(circuitJson)

    this.outline = db.pcb_board
      .list()
      .flatMap((board) => getBoardEdgeSegments(board))
      .map((segment) => ({
        bounds: transformBoundingBox(
          boundingBoxOfPoints(segment),
          CIRCUIT_JSON_TO_BOARD_MATRIX,
        ),
      }))

    const pastePositions: PastePosition[] = []
    for (const paste of db.pcb_solder_paste.list()) {
      const center = getElementCenter(paste)
      if (center) pastePositions.push({ layer: paste.layer, center })
    }

    const netNameByPortId = buildNetNameByPortId(db)
    const lookupNetName = (portId: string | undefined) =>
      portId === undefined ? undefined : netNameByPortId.get(portId)
    const referenceBySourceComponentId = new Map(
      db.source_component
        .list()
        .map((sc) => [sc.source_component_id, sc.name] as const),
    )

    const padsByComponentId = new Map<string, PadSnapshot[]>()
    const looseFootprints: FootprintSnapshot[] = []

    const addPad = (componentId: string | undefined, pad: PadSnapshot) => {
      if (componentId === undefined) {
        looseFootprints.push({
          reference: "",
          side: "front",
          bounds: { ...pad.position, width: 0, height: 0 },
          pads: [pad],
        })
        return
      }
      const pads = padsByComponentId.get(componentId) ?? []
      pads.push(pad)
      padsByComponentId.set(componentId, pads)
    }

    for (const smtpad of db.pcb_smtpad.list()) {
      const center = getElementCenter(smtpad)
      if (!center) continue
      const layers = this.getPadLayers(
        smtpad.pcb_smtpad_id,
        [smtpad.layer],
        center,
        pastePositions,
      )
      addPad(
        smtpad.pcb_component_id,
        createPad(center, "smd", layers, lookupNetName(smtpad.pcb_port_id)),
      )
    }

    for (const hole of db.pcb_plated_hole.list()) {
      const center = getElementCenter(hole)
      if (!center) continue
      const layers = this.getPadLayers(
        hole.pcb_plated_hole_id,
        hole.layers,
        center,
        pastePositions,
      )
      addPad(
        hole.pcb_component_id,
        createPad(
          center,
          "through_hole",
          layers,
          lookupNetName(hole.pcb_port_id),
        ),
      )
    }

    this.footprints = [
      ...db.pcb_component.list().map((component) =>
        createFootprint(
          component,
          referenceBySourceComponentId.get(component.source_component_id) ?? "",
          padsByComponentId.get(component.pcb_component_id) ?? [],
        ),
      ),
      ...looseFootprints,
    ]
  }

  getOutlinePrimitives(): readonly OutlinePrimitive[] {
    return this.outline
  }

  getFootprints(): readonly FootprintSnapshot[] {
    return this.footprints
  }

  getTitleBlockRevision(): string | undefined {
    return this.options.revision
  }

  private getPadLayers(
    padId: string,
    copperRefs: readonly LayerRef[],
    circuitJsonCenter: Point,
    pastePositions: readonly PastePosition[],
  ): LayerId[] {
    const layers: LayerId[] = []
    for (const ref of copperRefs) {
      const copper = COPPER_LAYER_BY_REF[ref]
      if (copper) layers.push(copper)

      const paste = PASTE_LAYER_BY_REF[ref]
      const hasPaste = pastePositions.some(
        (p) =>
          p.layer === ref &&
          Math.abs(p.center.x - circuitJsonCenter.x) < PASTE_MATCH_TOLERANCE &&
          Math.abs(p.center.y - circuitJsonCenter.y) < PASTE_MATCH_TOLERANCE,
      )
      if (paste && hasPaste) layers.push(paste)
    }
    return [...layers, ...(this.options.padLayers?.[padId] ?? [])]
  }
}

export const createBoardSnapshotFromCircuitJson = (
  circuitJson: CircuitJson,
  options?: CircuitJsonBoardSnapshotOptions,
): BoardSnapshot => new CircuitJsonBoardSnapshot(circuitJson, options)

const createPad = (
  circuitJsonCenter: Point,
  padType: PadSnapshot["padType"],
  layers: LayerId[],
  netName: string | undefined,
): PadSnapshot => {
  const layerSet = new Set(layers)
  return {
    position: applyToPoint(CIRCUIT_JSON_TO_BOARD_MATRIX, circuitJsonCenter),
    padType,
    netName: netName ?? "",
    isOnLayer: (layer) => layerSet.has(layer),
  }
}

const createFootprint = (
  component: PcbComponent,
  reference: string,
  pads: PadSnapshot[],
): FootprintSnapshot => ({
  reference,
  side: component.layer === "bottom" ? "back" : "front",
  bounds: transformBoundingBox(
    boundingBoxFromCenter(component.center, component.width, component.height),
    CIRCUIT_JSON_TO_BOARD_MATRIX,
  ),
  pads,
})

/**
 * Outline segments as point pairs, closing the outline back to its start.
 */
const getBoardEdgeSegments = (board: PcbBoard): Point[][] => {
  const outline = board.outline ?? []
  if (outline.length >= 2) {
    return outline.map((point, i) => [
      point,
      outline[(i + 1) % outline.length] ?? point,
    ])
  }

  const width = board.width ?? 0
  const height = board.height ?? 0
  if (width === 0 && height === 0) return []

  const { x, y } = board.center
  const corners = [
    { x: x - width / 2, y: y - height / 2 },
    { x: x + width / 2, y: y - height / 2 },
    { x: x + width / 2, y: y + height / 2 },
    { x: x - width / 2, y: y + height / 2 },
  ]
  return corners.map((corner, i) => [corner, corners[(i + 1) % 4] ?? corner])
}

const buildNetNameByPortId = (
  db: CircuitJsonUtilObjects,
): Map<string, string> => {
  const netNameById = new Map(
    db.source_net.list().map((net) => [net.source_net_id, net.name] as const),
  )
  const netNameBySourcePortId = new Map<string, string>()
  for (const trace of db.source_trace.list()) {
    const netId = trace.connected_source_net_ids[0]
    const netName = netId === undefined ? undefined : netNameById.get(netId)
    if (netName === undefined) continue
    for (const sourcePortId of trace.connected_source_port_ids) {
      netNameBySourcePortId.set(sourcePortId, netName)
    }
  }

  const netNameByPcbPortId = new Map<string, string>()
  for (const port of db.pcb_port.list()) {
    const netName = netNameBySourcePortId.get(port.source_port_id)
    if (netName !== undefined) netNameByPcbPortId.set(port.pcb_port_id, netName)
  }
  return netNameByPcbPortId
}

const isPoint = (value: unknown): value is Point =>
  typeof value === "object" &&
  value !== null &&
  "x" in value &&
  "y" in value &&
  typeof value.x === "number" &&
  typeof value.y === "number"

/**
 * Center of a pad-like element: its x/y when it has them, otherwise the
 * center of its polygon points.
 */
const getElementCenter = (element: object): Point | null => {
  if (isPoint(element)) return { x: element.x, y: element.y }

  if ("points" in element && Array.isArray(element.points)) {
    const points = element.points.filter(isPoint)
    if (points.length === 0) return null
    const box = boundingBoxOfPoints(points)
    return { x: box.x + box.width / 2, y: box.y + box.height / 2 }
  }

  return null
}
