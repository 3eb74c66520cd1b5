import {
  LAYERS,
  type BoardSide,
  type FootprintSnapshot,
  type PadSnapshot,
} from "../board/types"
import type { SelectionConfig, TestPointLayerMode } from "./config"
import type { ScanSide } from "./types"

export type TestPointVerdict =
  | { accepted: true; reason: "forced" | "smd" | "through_hole" }
  | {
      accepted: false
      reason:
        | "not_on_layer"
        | "ignored"
        | "has_paste"
        | "smd_excluded"
        | "through_hole_excluded"
        | "through_hole_same_side"
        | "unsupported_pad_type"
    }

export const FRONT_SCAN: ScanSide = {
  side: "front",
  copperLayer: LAYERS.frontCopper,
  pasteLayer: LAYERS.frontPaste,
  mirror: false,
}

export const BACK_SCAN: ScanSide = {
  side: "back",
  copperLayer: LAYERS.backCopper,
  pasteLayer: LAYERS.backPaste,
  mirror: true,
}

/**
 * Sides to scan for a layer mode, front first.
 */
export const getScanSides = (mode: TestPointLayerMode): ScanSide[] => {
  switch (mode) {
    case "F.Cu":
      return [FRONT_SCAN]
    case "B.Cu":
      return [BACK_SCAN]
    case "both":
      return [FRONT_SCAN, BACK_SCAN]
  }
}

const oppositeSide = (side: BoardSide): BoardSide =>
  side === "front" ? "back" : "front"

/**
 * Decide whether a pad is a test point on the side being scanned. Checks run
 * in a fixed order and the first one that decides wins:
 *
 * 1. the pad must be on the scanned copper layer
 * 2. pads on the force layer are accepted
 * 3. pads on the ignore layer are rejected
 * 4. pads with paste on the scanned side are rejected (not bare copper)
 * 5. SMD pads need includeSmd; through-hole pads need includeThroughHole and
 *    a footprint placed on the other side, since the component body blocks
 *    the probe on its own side; other pad types are rejected
 */
export function selectTestPoint(
  pad: PadSnapshot,
  footprint: FootprintSnapshot,
  scan: ScanSide,
  selection: SelectionConfig,
): TestPointVerdict {
  if (!pad.isOnLayer(scan.copperLayer)) {
    return { accepted: false, reason: "not_on_layer" }
  }

  if (pad.isOnLayer(selection.forceLayer)) {
    return { accepted: true, reason: "forced" }
  }

  if (pad.isOnLayer(selection.ignoreLayer)) {
    return { accepted: false, reason: "ignored" }
  }

  if (pad.isOnLayer(scan.pasteLayer)) {
    return { accepted: false, reason: "has_paste" }
  }

  switch (pad.padType) {
    case "smd":
      return selection.includeSmd
        ? { accepted: true, reason: "smd" }
        : { accepted: false, reason: "smd_excluded" }
    case "through_hole":
      if (!selection.includeThroughHole) {
        return { accepted: false, reason: "through_hole_excluded" }
      }
      return footprint.side === oppositeSide(scan.side)
        ? { accepted: true, reason: "through_hole" }
        : { accepted: false, reason: "through_hole_same_side" }
    default:
      return { accepted: false, reason: "unsupported_pad_type" }
  }
}
