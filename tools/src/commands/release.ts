/**
 * Release command - full build, notarize, verify, publish pipeline
 */
import { Command, Options } from "@effect/cli"
import { Effect } from "effect"
import { withEnvFile } from "../config.js"
import { loadReleaseSettings, reportLines, runRelease } from "../pipeline.js"
import { envFileOption, publishDirOption } from "./options.js"

const createDmgOption = Options.boolean("create-dmg").pipe(
  Options.withDescription("Create and sign the DMG from the app bundle instead of expecting the builder to")
)

export const releaseCommand = Command.make(
  "release",
  { envFile: envFileOption, publishDir: publishDirOption, createDmg: createDmgOption },
  ({ envFile, publishDir, createDmg }) =>
    Effect.gen(function* () {
      const settings = yield* loadReleaseSettings({ publishDir, createDiskImage: createDmg })

      yield* Effect.log(`🚀 Starting ${settings.productName} release...`)
      const report = yield* runRelease(settings)

      yield* Effect.log("✅ Build complete!")
      for (const line of reportLines(report)) {
        yield* Effect.log(line)
      }
    }).pipe(withEnvFile(envFile))
).pipe(Command.withDescription("Build, sign, notarize, verify, and publish the DMG"))
