/**
 * Layer compositions and exports
 */
import { Layer } from "effect"
import { NodeContext } from "@effect/platform-node"
import { BuildSupervisorLive } from "./BuildSupervisorLive.js"
import { DiskImageLive } from "./DiskImageLive.js"
import { GatekeeperLive } from "./GatekeeperLive.js"
import { NotaryLive } from "./NotaryLive.js"
import { SigningIdentitiesLive } from "./SigningIdentitiesLive.js"

/**
 * All services layer - compose all service layers
 */
export const AllServicesLive = Layer.mergeAll(
  BuildSupervisorLive,
  DiskImageLive,
  GatekeeperLive,
  NotaryLive,
  SigningIdentitiesLive
)

/**
 * Main application layer - All services + NodeContext
 * NodeContext provides CommandExecutor, FileSystem, Path, etc.
 */
export const MainLive = AllServicesLive.pipe(Layer.provideMerge(NodeContext.layer))

// Re-export individual layers
export { BuildSupervisorLive, DiskImageLive, GatekeeperLive, NotaryLive, SigningIdentitiesLive }
