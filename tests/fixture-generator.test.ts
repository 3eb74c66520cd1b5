import { expect, test } from "vitest"
import { createBoardSnapshot } from "../lib/board/createBoardSnapshot"
import { parseFixtureConfig } from "../lib/fixture/config"
import {
  InvalidConfigurationError,
  NoTestPointsFoundError,
} from "../lib/fixture/errors"
import {
  FixtureGenerator,
  generateFixtureGeometry,
  generateFixtureParameters,
} from "../lib/fixture/FixtureGenerator"
import { getFixtureOutputPaths } from "../lib/fixture/outputPaths"
import {
  createSampleBoard,
  rectangleOutline,
  sampleFootprints,
} from "./fixtures/boards"

const hardware = parseFixtureConfig({
  materialThickness: "2.45",
  pcbThickness: 0.8,
  washerThickness: "1.0",
  nutThickness: 2.4,
  revision: "rev_11",
})

test("front side SMD scan picks the exposed test pad only", () => {
  const { geometry, diagnostics } = generateFixtureGeometry(createSampleBoard())

  expect(diagnostics).toEqual([])
  expect(geometry.origin).toEqual({ x: 10, y: 5 })
  expect(geometry.dimensions).toEqual({ width: 100, height: 50 })
  expect(geometry.testPoints).toEqual([
    {
      position: { x: 5, y: 2.01 },
      side: "front",
      netName: "VCC",
      footprintReference: "TP1",
    },
  ])
  expect(geometry.minY).toBe(2.01)
})

test("back side scan mirrors X and probes front through-hole pins", () => {
  const { geometry } = generateFixtureGeometry(createSampleBoard(), {
    testPointLayer: "B.Cu",
    includeThroughHole: true,
  })

  expect(
    geometry.testPoints.map((tp) => [tp.footprintReference, tp.position]),
  ).toEqual([
    ["J1", { x: 47.5, y: 27.5 }],
    ["TP2", { x: 29, y: 36 }],
  ])
  expect(geometry.testPointsTop).toEqual([])
  expect(geometry.minY).toBe(27.5)
})

test("both sides keep top and bottom lists apart and merge them in order", () => {
  const { geometry } = generateFixtureGeometry(createSampleBoard(), {
    testPointLayer: "both",
    includeThroughHole: true,
  })

  expect(geometry.testPointsTop.map((tp) => tp.position)).toEqual([
    { x: 5, y: 2.01 },
  ])
  expect(geometry.testPointsBottom.map((tp) => tp.position)).toEqual([
    { x: 47.5, y: 27.5 },
    { x: 29, y: 36 },
  ])
  expect(geometry.testPoints.map((tp) => tp.side)).toEqual([
    "front",
    "back",
    "back",
  ])
  expect(geometry.minY).toBe(2.01)
})

test("undefined selection fields keep their defaults", () => {
  const { geometry } = generateFixtureGeometry(createSampleBoard(), {
    testPointLayer: undefined,
    includeSmd: undefined,
  })

  expect(
    geometry.testPoints.map((tp) => [tp.footprintReference, tp.position]),
  ).toEqual([["TP1", { x: 5, y: 2.01 }]])
})

test("an empty selection leaves minY at Infinity", () => {
  const { geometry } = generateFixtureGeometry(createSampleBoard(), {
    includeSmd: false,
  })

  expect(geometry.testPoints).toEqual([])
  expect(geometry.minY).toBe(Infinity)
})

test("a test point on the origin line gives minY 0", () => {
  const board = createBoardSnapshot({
    outline: rectangleOutline(10, 5, 100, 50),
    footprints: [
      {
        reference: "TP9",
        side: "front",
        bounds: { x: 19, y: 4, width: 2, height: 2 },
        pads: [{ position: { x: 20, y: 5 }, padType: "smd", layers: ["F.Cu"] }],
      },
    ],
  })

  const { geometry } = generateFixtureGeometry(board)

  expect(geometry.testPoints.map((tp) => tp.position)).toEqual([{ x: 10, y: 0 }])
  expect(geometry.minY).toBe(0)
})

test("native units are scaled to millimeters", () => {
  const nm = 1_000_000
  const board = createBoardSnapshot({
    nativeUnitsPerMm: nm,
    outline: rectangleOutline(10 * nm, 5 * nm, 100 * nm, 50 * nm),
    footprints: [
      {
        reference: "TP1",
        side: "front",
        bounds: { x: 14 * nm, y: 6 * nm, width: 2 * nm, height: 2 * nm },
        pads: [
          {
            position: { x: 15_003_000, y: 7_006_000 },
            padType: "smd",
            layers: ["F.Cu"],
          },
        ],
      },
    ],
  })

  const { geometry } = generateFixtureGeometry(board)

  expect(geometry.origin.x).toBeCloseTo(10, 9)
  expect(geometry.origin.y).toBeCloseTo(5, 9)
  expect(geometry.dimensions).toEqual({ width: 100, height: 50 })
  expect(geometry.testPoints.map((tp) => tp.position)).toEqual([{ x: 5, y: 2.01 }])
})

test("invalid native units are rejected", () => {
  expect(
    () => new FixtureGenerator(createBoardSnapshot({ nativeUnitsPerMm: 0 })),
  ).toThrow("Invalid nativeUnitsPerMm: 0")
})

test("the generator can be stepped one stage at a time", () => {
  const generator = new FixtureGenerator(createSampleBoard())

  expect(() => generator.getGeometry()).toThrow(
    "Fixture geometry has not been generated yet",
  )

  generator.step()
  expect(generator.ctx.dimensions).toEqual({ width: 100, height: 50 })
  expect(generator.finished).toBe(false)

  generator.step()
  expect(generator.finished).toBe(true)
  expect(generator.getGeometry().testPoints).toHaveLength(1)
  expect(() => generator.getOutput()).toThrow(
    "Fixture parameters have not been assembled",
  )
})

test("parameters are assembled in order with two decimal literals", () => {
  const { parameters } = generateFixtureParameters(createSampleBoard(), {
    selection: { testPointLayer: "both", includeThroughHole: true },
    hardware,
    outputPaths: getFixtureOutputPaths("/out", "board", "both"),
  })

  expect(Object.entries(parameters)).toEqual([
    ["test_points_top", "[[5.00,2.01]]"],
    ["test_points_bottom", "[[47.50,27.50],[29.00,36.00]]"],
    ["test_points", "[[5.00,2.01],[47.50,27.50],[29.00,36.00]]"],
    ["tp_min_y", "2.01"],
    ["mat_th", "2.45"],
    ["pcb_th", "0.80"],
    ["pcb_x", "100.00"],
    ["pcb_y", "50.00"],
    ["pcb_outline", '"/out/board-outline.dxf"'],
    ["screw_thr_len", "14.00"],
    ["screw_d", "3.00"],
    ["pcb_track_top", '"/out/board-track-top.dxf"'],
    ["pcb_track_bottom", '"/out/board-track-bottom.dxf"'],
    ["rev", '"rev_11"'],
    ["washer_th", "1.00"],
    ["nut_th", "2.40"],
  ])
})

test("single side assembly uses one track drawing", () => {
  const { parameters } = generateFixtureParameters(createSampleBoard(), {
    hardware,
    outputPaths: getFixtureOutputPaths("/out", "board", "F.Cu"),
  })

  expect(parameters.test_points).toBe("[[5.00,2.01]]")
  expect(parameters.pcb_track).toBe('"/out/board-track.dxf"')
  expect(parameters.test_points_top).toBeUndefined()
  expect(parameters.pcb_track_top).toBeUndefined()
})

test("revision falls back to the title block, then rev.0", () => {
  const { revision: _, ...withoutRevision } = hardware
  const outputPaths = getFixtureOutputPaths("/out", "board", "F.Cu")

  expect(
    generateFixtureParameters(createSampleBoard("B"), {
      hardware: withoutRevision,
      outputPaths,
    }).parameters.rev,
  ).toBe('"rev.B"')
  expect(
    generateFixtureParameters(createSampleBoard(), {
      hardware: withoutRevision,
      outputPaths,
    }).parameters.rev,
  ).toBe('"rev.0"')
})

test("logo parameters are emitted last when configured", () => {
  const { parameters } = generateFixtureParameters(createSampleBoard(), {
    hardware: parseFixtureConfig({
      materialThickness: 3,
      logo: { file: "logo.dxf", scale: "0.5" },
    }),
    outputPaths: getFixtureOutputPaths("/out", "board", "F.Cu"),
  })

  expect(Object.keys(parameters).slice(-3)).toEqual(["rev", "logo_file", "logo_scale"])
  expect(parameters.logo_file).toBe('"logo.dxf"')
  expect(parameters.logo_scale).toBe("0.50")
})

test("assembly without test points throws", () => {
  const board = createBoardSnapshot({
    outline: rectangleOutline(10, 5, 100, 50),
    footprints: sampleFootprints().filter((fp) => fp.reference === "U1"),
  })

  expect(() =>
    generateFixtureParameters(board, {
      hardware,
      outputPaths: getFixtureOutputPaths("/out", "board", "F.Cu"),
    }),
  ).toThrow(NoTestPointsFoundError)
})

test("missing test point errors name the scanned layers", () => {
  expect(new NoTestPointsFoundError("B.Cu").message).toBe(
    "No test points found on B.Cu. Verify that the board has exposed pads without paste, or place pads on the force layer to include them.",
  )
  expect(new NoTestPointsFoundError("both").message).toBe(
    "No test points found on either side of the board (F.Cu and B.Cu). Verify that the board has exposed pads without paste, or place pads on the force layer to include them.",
  )
  expect(new NoTestPointsFoundError("F.Cu").name).toBe("NoTestPointsFoundError")
})

test("hardware literals round the stored value to two decimals", () => {
  const { parameters } = generateFixtureParameters(createSampleBoard(), {
    hardware: parseFixtureConfig({
      materialThickness: "3.175",
      pcbThickness: "2.675",
      washerThickness: "1.575",
      supportBorder: 2.225,
    }),
    outputPaths: getFixtureOutputPaths("/out", "board", "F.Cu"),
  })

  expect(parameters.mat_th).toBe("3.17")
  expect(parameters.pcb_th).toBe("2.67")
  expect(parameters.washer_th).toBe("1.57")
  expect(parameters.pcb_support_border).toBe("2.23")
})

test("a non-finite hardware value fails assembly as invalid configuration", () => {
  const run = () =>
    generateFixtureParameters(createSampleBoard(), {
      hardware: { ...hardware, materialThickness: Number.NaN },
      outputPaths: getFixtureOutputPaths("/out", "board", "F.Cu"),
    })

  expect(run).toThrow(InvalidConfigurationError)
  expect(run).toThrow('Invalid value for "mat_th": null (expected a finite number)')
})
