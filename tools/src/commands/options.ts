/**
 * Options shared by every command
 */
import { Options } from "@effect/cli"
import { Config } from "effect"

export const envFileOption = Options.text("env-file").pipe(
  Options.withFallbackConfig(Config.string("ENV_FILE").pipe(Config.withDefault("../.env.local"))),
  Options.withDescription("Env file holding the Apple credentials (default: ENV_FILE, then ../.env.local)")
)

export const publishDirOption = Options.text("publish-dir").pipe(
  Options.optional,
  Options.withDescription("Directory the artifact is copied into (default: PUBLISH_DIR)")
)
