/**
 * Dual-condition build poller
 *
 * The builder can hang after its real work is done, so completion is detected
 * from two independent signals: the child exiting, or the artifact appearing
 * and then passing the local trust policy. The second one overrides waiting
 * for the first.
 *
 *   Waiting -> ArtifactSeen -> Notarized -> Done
 *   any running state -> ProcessExited
 *   deadline -> TimedOut
 */
import { Data, Duration, Effect, Option, Schedule, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import type { BuildHandle, TerminateOutcome } from "./services/BuildSupervisor.js"
import { Gatekeeper } from "./services/Gatekeeper.js"
import { BuildArtifactMissing, type OutputKind } from "./errors.js"

export interface OutputPaths {
  readonly bundle: string
  readonly artifact: string
}

export interface PollSettings {
  /** Seconds between ticks. */
  readonly interval: number
  /** Seconds of elapsed ticks before giving up. */
  readonly deadline: number
  /** Seconds between progress lines. */
  readonly heartbeat: number
}

/** Flags only ever go from false to true within a run. */
export interface ArtifactState {
  readonly bundlePresent: boolean
  readonly artifactPresent: boolean
  readonly notarized: boolean
}

export const initialArtifactState: ArtifactState = {
  bundlePresent: false,
  artifactPresent: false,
  notarized: false,
}

export const mergeArtifactState = (
  previous: ArtifactState,
  observed: Partial<ArtifactState>
): ArtifactState => ({
  bundlePresent: previous.bundlePresent || observed.bundlePresent === true,
  artifactPresent: previous.artifactPresent || observed.artifactPresent === true,
  notarized: previous.notarized || observed.notarized === true,
})

export type PollState = Data.TaggedEnum<{
  Waiting: {}
  ArtifactSeen: { readonly at: number }
  Notarized: { readonly at: number }
  Done: { readonly at: number }
  ProcessExited: { readonly at: number; readonly exitCode: number }
  TimedOut: { readonly at: number }
}>

export const PollState = Data.taggedEnum<PollState>()

export type Observation = Data.TaggedEnum<{
  Exited: { readonly exitCode: number }
  Running: { readonly artifactExists: boolean; readonly accepted: boolean }
}>

export const Observation = Data.taggedEnum<Observation>()

export interface Transition {
  readonly state: PollState
  /** States entered by this step, in order. */
  readonly entered: ReadonlyArray<PollState>
  readonly terminate: boolean
}

export const isTerminal = (state: PollState) =>
  state._tag === "Done" || state._tag === "ProcessExited" || state._tag === "TimedOut"

const stay = (state: PollState): Transition => ({ state, entered: [], terminate: false })

/**
 * One tick of the machine. Pure: the driver performs the probes and acts on
 * `terminate`. Terminal states absorb every observation.
 */
export const step = (state: PollState, observation: Observation, at: number): Transition => {
  if (isTerminal(state)) {
    return stay(state)
  }

  if (observation._tag === "Exited") {
    const exited = PollState.ProcessExited({ at, exitCode: observation.exitCode })
    return { state: exited, entered: [exited], terminate: false }
  }

  switch (state._tag) {
    case "Waiting": {
      if (!observation.artifactExists) return stay(state)
      const seen = PollState.ArtifactSeen({ at })
      return { state: seen, entered: [seen], terminate: false }
    }
    case "ArtifactSeen": {
      if (!observation.accepted) return stay(state)
      const done = PollState.Done({ at })
      return { state: done, entered: [PollState.Notarized({ at }), done], terminate: true }
    }
    default:
      return stay(state)
  }
}

export interface PollOutcome {
  readonly state: PollState
  readonly artifacts: ArtifactState
  readonly trace: ReadonlyArray<PollState>
  readonly terminated: Option.Option<TerminateOutcome>
}

/** The producer may still be flushing when a path first shows up. */
const transientIo = { times: 2, schedule: Schedule.spaced("200 millis") }

export const pathExists = (fs: FileSystem.FileSystem, path: string) =>
  pipe(
    fs.exists(path),
    Effect.retry(transientIo),
    Effect.catchAll(error =>
      pipe(Effect.logDebug(`Could not check ${path}: ${error.message}`), Effect.as(false))
    )
  )

const statPath = (fs: FileSystem.FileSystem, path: string) =>
  pipe(
    fs.stat(path),
    Effect.retry(transientIo),
    Effect.option
  )

/** Filesystem timestamps can trail the wall clock by up to this much. */
const MTIME_TOLERANCE_MS = 2_000

/** True when the file was last written before the build started. */
export const predates = (info: FileSystem.File.Info, startedAt: number) =>
  Option.match(info.mtime, {
    onNone: () => false,
    onSome: mtime => mtime.getTime() < startedAt - MTIME_TOLERANCE_MS,
  })

const describeState = (state: PollState) =>
  PollState.$match(state, {
    Waiting: () => "Waiting for build output...",
    ArtifactSeen: ({ at }) => `✓ Artifact produced (${at}s)`,
    Notarized: ({ at }) => `✓ Artifact accepted by Gatekeeper (${at}s)`,
    Done: ({ at }) => `✓ Build complete (${at}s), stopping builder`,
    ProcessExited: ({ at, exitCode }) => `Builder exited with code ${exitCode} (${at}s)`,
    TimedOut: ({ at }) => `⚠ Build did not finish within ${at}s`,
  })

const crossed = (elapsed: number, previous: number, period: number) =>
  period > 0 && Math.floor(elapsed / period) > Math.floor(previous / period)

export interface WatchOptions {
  /** Off when the pipeline creates the artifact itself after the build. */
  readonly watchArtifact: boolean
  /** Ignore an artifact written before the build started. */
  readonly rejectStale: boolean
}

/**
 * Watches the running build until it exits, its artifact is notarized, or the
 * deadline passes. Reaching the deadline leaves the child running.
 */
export const pollBuild = (
  handle: BuildHandle,
  paths: OutputPaths,
  settings: PollSettings,
  options: WatchOptions = { watchArtifact: true, rejectStale: true }
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const gatekeeper = yield* Gatekeeper

    if (!(settings.interval > 0)) {
      return yield* Effect.dieMessage(`Poll interval must be positive, got ${settings.interval}`)
    }

    // An artifact left by an earlier run must not stop this build
    const artifactProduced = Effect.gen(function* () {
      if (!options.watchArtifact) return false
      if (!(yield* pathExists(fs, paths.artifact))) return false
      if (!options.rejectStale) return true

      const info = yield* statPath(fs, paths.artifact)
      return Option.match(info, {
        onNone: () => false,
        onSome: info => !predates(info, handle.startedAt),
      })
    })

    let state: PollState = PollState.Waiting()
    let artifacts = initialArtifactState
    let terminated = Option.none<TerminateOutcome>()
    const trace: Array<PollState> = []
    let elapsed = 0

    yield* Effect.log(describeState(state))

    while (elapsed < settings.deadline) {
      let observation: Observation
      if (yield* handle.isAlive) {
        const bundleExists = artifacts.bundlePresent || (yield* pathExists(fs, paths.bundle))
        const artifactExists =
          state._tag === "Waiting" ? yield* artifactProduced : artifacts.artifactPresent
        const accepted = state._tag === "ArtifactSeen" ? yield* gatekeeper.assess(paths.artifact) : false

        artifacts = mergeArtifactState(artifacts, {
          bundlePresent: bundleExists,
          artifactPresent: artifactExists,
          notarized: accepted,
        })
        observation = Observation.Running({ artifactExists, accepted })
      } else {
        const { exitCode } = yield* handle.join
        observation = Observation.Exited({ exitCode })
      }

      const transition = step(state, observation, elapsed)
      state = transition.state
      for (const entered of transition.entered) {
        trace.push(entered)
        yield* Effect.log(describeState(entered))
      }

      if (transition.terminate) {
        const outcome = yield* handle.terminate
        terminated = Option.some(outcome)
        yield* Effect.logDebug(`Terminate: ${outcome._tag}`)
      }

      if (isTerminal(state)) break

      yield* Effect.sleep(Duration.seconds(settings.interval))
      const previous = elapsed
      elapsed += settings.interval

      if (crossed(elapsed, previous, settings.heartbeat)) {
        yield* Effect.log(`Still building... (${elapsed}s elapsed)`)
      }
    }

    if (!isTerminal(state)) {
      state = PollState.TimedOut({ at: elapsed })
      trace.push(state)
      yield* Effect.logWarning(describeState(state))
    }

    return { state, artifacts, trace, terminated } satisfies PollOutcome
  })

export interface ValidationOptions {
  /** Off when the pipeline creates the artifact itself after the build. */
  readonly requireArtifact: boolean
  readonly rejectStale: boolean
  readonly buildCommand: string
}

const missing = (kind: OutputKind, path: string, reason: BuildArtifactMissing["reason"], buildCommand: string) => {
  const label = kind === "bundle" ? "app bundle" : "artifact"
  const detail =
    reason === "not-found"
      ? `${label} not found at ${path}`
      : reason === "not-a-bundle"
        ? `${path} is not an app bundle (expected a directory with Contents/Info.plist)`
        : `${label} at ${path} predates this build`
  return new BuildArtifactMissing({
    kind,
    path,
    reason,
    message: `Build failed - ${detail}. Check the builder output, then rerun: ${buildCommand}`,
  })
}

/**
 * Checks the outputs after polling, whatever state it ended in. A non-zero
 * builder exit is only a warning when the outputs are there.
 */
export const validateOutputs = (
  paths: OutputPaths,
  outcome: PollOutcome,
  startedAt: number,
  options: ValidationOptions
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    if (outcome.state._tag === "ProcessExited" && outcome.state.exitCode !== 0) {
      yield* Effect.logWarning(
        `⚠ Builder exited with code ${outcome.state.exitCode}; checking its outputs anyway`
      )
    }

    const isStale = (info: FileSystem.File.Info) => options.rejectStale && predates(info, startedAt)

    const bundle = yield* statPath(fs, paths.bundle)
    if (Option.isNone(bundle)) {
      return yield* missing("bundle", paths.bundle, "not-found", options.buildCommand)
    }
    if (
      bundle.value.type !== "Directory" ||
      !(yield* pathExists(fs, path.join(paths.bundle, "Contents", "Info.plist")))
    ) {
      return yield* missing("bundle", paths.bundle, "not-a-bundle", options.buildCommand)
    }
    if (isStale(bundle.value)) {
      return yield* missing("bundle", paths.bundle, "stale", options.buildCommand)
    }
    yield* Effect.log(`✓ App bundle at ${paths.bundle}`)

    if (!options.requireArtifact) return

    const artifact = yield* statPath(fs, paths.artifact)
    if (Option.isNone(artifact) || artifact.value.type !== "File") {
      return yield* missing("artifact", paths.artifact, "not-found", options.buildCommand)
    }
    if (isStale(artifact.value)) {
      return yield* missing("artifact", paths.artifact, "stale", options.buildCommand)
    }
    yield* Effect.log(`✓ Artifact at ${paths.artifact}`)
  })
