/**
 * Disk image service - creating and signing the distributable
 */
import { Context, Effect } from "effect"
import type { ToolFailed } from "../errors.js"

export interface DiskImageService {
  readonly create: (
    appBundle: string,
    dmgPath: string,
    volumeName: string
  ) => Effect.Effect<void, ToolFailed>

  readonly sign: (dmgPath: string, identity: string) => Effect.Effect<void, ToolFailed>
}

export class DiskImage extends Context.Tag("release-pilot/DiskImage")<DiskImage, DiskImageService>() {}
