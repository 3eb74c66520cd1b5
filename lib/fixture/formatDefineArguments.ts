import { quoteString } from "./FixtureParameterBuilder"
import type { FixtureParameters } from "./types"

/**
 * What the geometry tool should produce from the parameters.
 */
export type GeometryToolMode = "lasercut" | "3dmodel" | "testcut"

/**
 * Turn fixture parameters into geometry tool argv entries:
 * `["-D", "name=literal", ...]`, with the output mode last when given.
 *
 * Entries are meant to be passed as separate argv items (no shell), so the
 * literals are not quoted again.
 */
export function formatDefineArguments(
  parameters: FixtureParameters,
  mode?: GeometryToolMode,
): string[] {
  const args: string[] = []
  for (const [name, literal] of Object.entries(parameters)) {
    args.push("-D", `${name}=${literal}`)
  }
  if (mode) {
    args.push("-D", `mode=${quoteString(mode)}`)
  }
  return args
}
