/**
 * Live implementation of DiskImage service
 */
import { Effect, Layer, pipe } from "effect"
import { Command, FileSystem, Path } from "@effect/platform"
import { DiskImage } from "../services/DiskImage.js"
import { ToolFailed } from "../errors.js"
import { describe, makeRunner } from "./command.js"

export const DiskImageLive = Layer.effect(
  DiskImage,
  Effect.gen(function* () {
    const runner = yield* makeRunner
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const runCommand = (...[name, ...args]: [string, ...string[]]) => {
      const command = Command.make(name, ...args)
      return pipe(
        runner.capture(command),
        Effect.mapError(
          error => new ToolFailed({ tool: name, exitCode: -1, message: `${name} could not run: ${error.message}` })
        ),
        Effect.flatMap(({ exitCode, stderr }) =>
          exitCode === 0
            ? Effect.void
            : Effect.fail(
                new ToolFailed({
                  tool: name,
                  exitCode,
                  message: `${describe(command)} failed with code ${exitCode}\n${stderr.trim()}`,
                })
              )
        )
      )
    }

    const io = (tool: string) =>
      Effect.mapError(
        (error: { readonly message: string }) => new ToolFailed({ tool, exitCode: -1, message: error.message })
      )

    const create = (appBundle: string, dmgPath: string, volumeName: string) =>
      Effect.gen(function* () {
        const stagingDir = path.join(path.dirname(dmgPath), "temp_dmg")
        const tempDmg = `${dmgPath}.temp.dmg`

        // Stage the app next to an Applications link
        yield* pipe(fs.remove(stagingDir, { recursive: true }), Effect.ignore)
        yield* pipe(fs.makeDirectory(stagingDir, { recursive: true }), io("mkdir"))
        yield* runCommand("ditto", appBundle, path.join(stagingDir, path.basename(appBundle)))
        yield* pipe(fs.symlink("/Applications", path.join(stagingDir, "Applications")), io("ln"))

        yield* runCommand(
          "hdiutil",
          "create",
          "-format",
          "UDRW",
          "-fs",
          "APFS",
          "-volname",
          volumeName,
          "-srcfolder",
          stagingDir,
          tempDmg
        )

        // Convert to compressed
        yield* pipe(fs.remove(dmgPath), Effect.ignore)
        yield* runCommand("hdiutil", "convert", tempDmg, "-format", "UDZO", "-o", dmgPath)

        // Clean up
        yield* pipe(fs.remove(stagingDir, { recursive: true }), io("rm"))
        yield* pipe(fs.remove(tempDmg), io("rm"))

        yield* Effect.log(`✓ Created DMG at ${dmgPath}`)
      })

    const sign = (dmgPath: string, identity: string) =>
      pipe(
        runCommand(
          "codesign",
          "--sign",
          identity,
          "--timestamp",
          "--options",
          "runtime",
          "--force",
          dmgPath
        ),
        Effect.tap(() => Effect.log(`✓ Signed DMG at ${dmgPath}`))
      )

    return DiskImage.of({ create, sign })
  })
)
