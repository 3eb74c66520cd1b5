import { readFileSync } from "node:fs"
import type { CircuitJson } from "circuit-json"
import { expect, test } from "vitest"
import { createBoardSnapshotFromCircuitJson } from "../lib/board/circuit-json/CircuitJsonBoardSnapshot"
import { generateFixtureGeometry } from "../lib/fixture/FixtureGenerator"

const loadCircuitJson = (name: string): CircuitJson =>
  JSON.parse(readFileSync(new URL(`./assets/${name}`, import.meta.url), "utf8"))

test("board rectangle becomes four Edge.Cuts edges in a Y-down frame", () => {
  const board = createBoardSnapshotFromCircuitJson(
    loadCircuitJson("test-pad-board.circuit.json"),
  )

  expect(board.nativeUnitsPerMm).toBe(1)
  expect(board.getOutlinePrimitives().map((p) => p.bounds)).toEqual([
    { x: 10, y: -5, width: 100, height: 0 },
    { x: 110, y: -55, width: 0, height: 50 },
    { x: 10, y: -55, width: 100, height: 0 },
    { x: 10, y: -55, width: 0, height: 50 },
  ])
})

test("components become footprints with their pads, loose pads come last", () => {
  const board = createBoardSnapshotFromCircuitJson(
    loadCircuitJson("test-pad-board.circuit.json"),
    { revision: "C" },
  )
  const footprints = board.getFootprints()

  expect(
    footprints.map((fp) => [fp.reference, fp.side, fp.pads.length]),
  ).toEqual([
    ["TP1", "front", 1],
    ["J1", "front", 1],
    ["U1", "back", 1],
    ["", "front", 1],
  ])
  expect(footprints[0]?.bounds).toEqual({ x: 14, y: -51, width: 2, height: 2 })
  expect(board.getTitleBlockRevision?.()).toBe("C")

  const testPad = footprints[0]?.pads[0]
  expect(testPad?.position).toEqual({ x: 15, y: -50 })
  expect(testPad?.padType).toBe("smd")
  expect(testPad?.netName).toBe("VCC")
  expect(testPad?.isOnLayer("F.Cu")).toBe(true)
  expect(testPad?.isOnLayer("F.Paste")).toBe(false)

  const pin = footprints[1]?.pads[0]
  expect(pin?.padType).toBe("through_hole")
  expect(pin?.isOnLayer("F.Cu")).toBe(true)
  expect(pin?.isOnLayer("B.Cu")).toBe(true)

  const pastedPad = footprints[2]?.pads[0]
  expect(pastedPad?.isOnLayer("B.Cu")).toBe(true)
  expect(pastedPad?.isOnLayer("B.Paste")).toBe(true)
  expect(pastedPad?.netName).toBe("")
})

test("front scan of a Circuit JSON board", () => {
  const { geometry, diagnostics } = generateFixtureGeometry(
    createBoardSnapshotFromCircuitJson(loadCircuitJson("test-pad-board.circuit.json")),
  )

  expect(diagnostics).toEqual([])
  expect(geometry.origin).toEqual({ x: 10, y: -55 })
  expect(geometry.dimensions).toEqual({ width: 100, height: 50 })
  expect(geometry.testPoints).toEqual([
    {
      position: { x: 5, y: 5 },
      side: "front",
      netName: "VCC",
      footprintReference: "TP1",
    },
    {
      position: { x: 90, y: 45 },
      side: "front",
      netName: "",
      footprintReference: "",
    },
  ])
})

test("extra pad layers put a pasted pad on the force layer", () => {
  const circuitJson = loadCircuitJson("test-pad-board.circuit.json")
  const selection = { testPointLayer: "B.Cu", includeThroughHole: true } as const

  const plain = generateFixtureGeometry(
    createBoardSnapshotFromCircuitJson(circuitJson),
    selection,
  )
  expect(plain.geometry.testPoints.map((tp) => tp.position)).toEqual([
    { x: 47.5, y: 22.5 },
  ])

  const forced = generateFixtureGeometry(
    createBoardSnapshotFromCircuitJson(circuitJson, {
      padLayers: { pcb_smtpad_1: ["Eco2.User"] },
    }),
    selection,
  )
  expect(
    forced.geometry.testPoints.map((tp) => [tp.footprintReference, tp.position]),
  ).toEqual([
    ["J1", { x: 47.5, y: 22.5 }],
    ["U1", { x: 70, y: 35 }],
  ])
})

test("board outline polygons are used when present", () => {
  const { geometry } = generateFixtureGeometry(
    createBoardSnapshotFromCircuitJson(loadCircuitJson("outline-board.circuit.json")),
  )

  expect(geometry.origin).toEqual({ x: 0, y: -40 })
  expect(geometry.dimensions).toEqual({ width: 80, height: 40 })
  expect(geometry.testPoints.map((tp) => tp.position)).toEqual([{ x: 10, y: 10 }])
})
