import { join } from "node:path"
import type { TestPointLayerMode } from "./config"

export type TrackDrawingPaths =
  | { kind: "single"; track: string }
  | { kind: "split"; trackTop: string; trackBottom: string }

/**
 * Drawing files exported from the board (consumed by the geometry tool) and
 * the files the geometry tool writes.
 */
export interface FixtureOutputPaths {
  outline: string
  tracks: TrackDrawingPaths
  laserCut: string
  render: string
  testCut: string
}

export function getFixtureOutputPaths(
  outDir: string,
  projectName: string,
  mode: TestPointLayerMode,
): FixtureOutputPaths {
  const file = (suffix: string) => join(outDir, `${projectName}-${suffix}`)

  return {
    outline: file("outline.dxf"),
    tracks:
      mode === "both"
        ? {
            kind: "split",
            trackTop: file("track-top.dxf"),
            trackBottom: file("track-bottom.dxf"),
          }
        : { kind: "single", track: file("track.dxf") },
    laserCut: file("fixture.dxf"),
    render: file("fixture.png"),
    testCut: file("test.dxf"),
  }
}
