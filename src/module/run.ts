// ---------------------------------------------------------------------------
// Module runner – one desired-state declaration in, one JSON result out
// ---------------------------------------------------------------------------
// This is the only place errors are caught: anything thrown by argument
// handling, the client or reconciliation becomes the failure result.
// ---------------------------------------------------------------------------

import { resolveModuleConfig } from "../config/env.js";
import { DeviceApiClient, type FetchLike } from "../devices/client.js";
import { createDevice } from "../devices/device.js";
import { ArchiveConnectionError, ArchiveHttpError } from "../devices/errors.js";
import { reconcileDevice } from "../devices/reconcile.js";
import type { DeviceApi, DeviceState } from "../devices/types.js";
import {
  createSubsystemLogger,
  levelForVerbosity,
  type SubsystemLogger,
} from "../logging/subsystem.js";
import { loadModuleArgs, type ArgsSourceDeps } from "./args.js";
import { describeModule } from "./describe.js";
import { MODULE_NAME, parseModuleParams } from "./params.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;

const USAGE = "usage: archive-device <args-file | -> | --describe";

export type ModuleSuccess = {
  name: string;
  state: DeviceState;
  changed: boolean;
  warnings?: string[];
};

export type ModuleSkipped = {
  changed: false;
  skipped: true;
  msg: string;
};

export type ModuleFailure = {
  failed: true;
  msg: string;
  status?: number;
  url?: string;
};

export type ModuleOutput = ModuleSuccess | ModuleSkipped | ModuleFailure;

export type RunDeviceModuleDeps = ArgsSourceDeps & {
  /** Arguments after the executable, e.g. `process.argv.slice(2)`. */
  argv: string[];
  env?: NodeJS.ProcessEnv;
  stdout: (line: string) => void;
  fetch?: FetchLike;
  log?: SubsystemLogger;
  /** Sink for the default logger; stderr when omitted. */
  writeLog?: (line: string) => void;
  createApi?: (apiUrl: string, name: string, log: SubsystemLogger) => DeviceApi;
};

export function failureOutput(err: unknown): ModuleFailure {
  if (err instanceof ArchiveHttpError) {
    return { failed: true, msg: err.message, status: err.status, url: err.url };
  }
  if (err instanceof ArchiveConnectionError) {
    return { failed: true, msg: err.message, url: err.url };
  }
  return { failed: true, msg: err instanceof Error ? err.message : String(err) };
}

export async function runDeviceModule(deps: RunDeviceModuleDeps): Promise<number> {
  const config = resolveModuleConfig(deps.env ?? process.env);
  const defaultLogger = (verbosity: number) =>
    createSubsystemLogger(MODULE_NAME, {
      level: levelForVerbosity(config.logLevel, verbosity),
      write: deps.writeLog,
    });
  let log = deps.log ?? defaultLogger(0);
  const print = (output: ModuleOutput | ReturnType<typeof describeModule>) =>
    deps.stdout(JSON.stringify(output));

  const [source, ...extra] = deps.argv;
  if (source === "--describe") {
    print(describeModule());
    return EXIT_OK;
  }
  if (source === undefined || extra.length > 0) {
    print({ failed: true, msg: USAGE });
    return EXIT_FAILED;
  }

  try {
    const raw = await loadModuleArgs(source, deps);
    const { params, internal, warnings } = parseModuleParams(raw, {
      apiUrlFallback: config.apiUrlFallback,
    });
    if (!deps.log && internal.verbosity > 0) {
      log = defaultLogger(internal.verbosity);
    }
    for (const warning of warnings) {
      log.warn(warning);
    }

    if (internal.checkMode) {
      print({
        changed: false,
        skipped: true,
        msg: `remote module (${MODULE_NAME}) does not support check mode`,
      });
      return EXIT_OK;
    }

    const api =
      deps.createApi?.(params.api_url, params.name, log.child("client")) ??
      new DeviceApiClient(params.api_url, params.name, {
        fetch: deps.fetch,
        log: log.child("client"),
      });
    const device = createDevice({
      name: params.name,
      host: params.host,
      port: params.port,
      aetitle: params.aetitle,
    });
    const result = await reconcileDevice({ state: params.state, device }, api, log);

    print({
      name: result.name,
      state: result.state,
      changed: result.changed,
      ...(warnings.length > 0 ? { warnings } : {}),
    });
    return EXIT_OK;
  } catch (err) {
    const failure = failureOutput(err);
    log.error(failure.msg);
    print(failure);
    return EXIT_FAILED;
  }
}
