/**
 * Effect platform layer and Promise bridge
 *
 * File system work is written as Effect programs against the platform
 * `FileSystem` and `Path` services; this module provides the Node.js layer
 * and runs programs to a Promise, so callers never see Effect types.
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import { currentLoggingLayer } from "../logging";

/**
 * Services a platform program may require
 */
export type PlatformServices = FileSystem.FileSystem | Path.Path;

/**
 * Effect platform layer for Node.js
 *
 * @returns Layer providing FileSystem, Path and the other Node services
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a platform program with the configured logger
 *
 * The promise rejects with the program's own failure value (not a fiber
 * wrapper), so typed errors survive the bridge.
 */
export async function runPlatform<A, E>(program: Effect.Effect<A, E, PlatformServices>): Promise<A> {
  const exit = await Effect.runPromiseExit(
    program.pipe(Effect.provide(getPlatform()), Effect.provide(currentLoggingLayer()))
  );
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
