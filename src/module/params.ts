// ---------------------------------------------------------------------------
// Module parameters – schema, aliases and validation
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const MODULE_NAME = "archive_device";

export const DEVICE_STATES = ["present", "absent"] as const;

export const DeviceModuleParamsSchema = Type.Object(
  {
    api_url: Type.String({
      description:
        "Base URL of the archive's management API, e.g. http://10.0.0.5:8080/dcm4chee-arc/. Falls back to ARCHIVE_API_URL.",
    }),
    name: Type.String({ description: "Name of the device. Alias: device." }),
    host: Type.String({ description: "Address or hostname of the device." }),
    port: Type.Integer({ description: "TCP port of the device." }),
    aetitle: Type.String({ description: "DICOM AE title of the device." }),
    state: Type.Union([Type.Literal("present"), Type.Literal("absent")], {
      description: "Whether the device should exist on the archive.",
    }),
  },
  { additionalProperties: false },
);

export type DeviceModuleParams = Static<typeof DeviceModuleParamsSchema>;

const OPTION_KEYS = Object.keys(DeviceModuleParamsSchema.properties);

const ALIASES: Record<string, string> = { device: "name" };

const INTERNAL_PREFIX = "_ansible_";

export type InternalParams = {
  checkMode: boolean;
  /** Count of `-v` flags the framework was run with. */
  verbosity: number;
};

export type ParsedModuleParams = {
  params: DeviceModuleParams;
  internal: InternalParams;
  warnings: string[];
};

export class ModuleParamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModuleParamError";
  }
}

function readInternal(raw: Record<string, unknown>): InternalParams {
  const verbosity = raw[`${INTERNAL_PREFIX}verbosity`];
  return {
    checkMode: raw[`${INTERNAL_PREFIX}check_mode`] === true,
    verbosity: typeof verbosity === "number" ? verbosity : 0,
  };
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

export function parseModuleParams(
  raw: Record<string, unknown>,
  opts: { apiUrlFallback?: string | null } = {},
): ParsedModuleParams {
  const internal = readInternal(raw);
  const warnings: string[] = [];
  const values: Record<string, unknown> = {};
  const unsupported: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(INTERNAL_PREFIX)) {
      continue;
    }
    if (OPTION_KEYS.includes(key) || key in ALIASES) {
      values[key] = value;
    } else {
      unsupported.push(key);
    }
  }

  if (unsupported.length > 0) {
    const supported = [...OPTION_KEYS, ...Object.keys(ALIASES)].toSorted();
    throw new ModuleParamError(
      `Unsupported parameters for (${MODULE_NAME}) module: ${unsupported.toSorted().join(", ")}. ` +
        `Supported parameters include: ${supported.join(", ")}.`,
    );
  }

  for (const [alias, option] of Object.entries(ALIASES)) {
    if (!(alias in values)) {
      continue;
    }
    if (option in values) {
      warnings.push(`Both option ${option} and its alias ${alias} are set.`);
    }
    values[option] = values[alias];
    delete values[alias];
  }

  if ((isMissing(values.api_url) || values.api_url === "") && opts.apiUrlFallback) {
    values.api_url = opts.apiUrlFallback;
  }

  const missing = OPTION_KEYS.filter((key) => isMissing(values[key]));
  if (missing.length > 0) {
    throw new ModuleParamError(`missing required arguments: ${missing.toSorted().join(", ")}`);
  }

  const state = values.state;
  if (typeof state !== "string" || !(DEVICE_STATES as readonly string[]).includes(state)) {
    throw new ModuleParamError(
      `value of state must be one of: ${DEVICE_STATES.join(", ")}, got: ${String(state)}`,
    );
  }

  const converted = Value.Convert(DeviceModuleParamsSchema, values);
  if (!Value.Check(DeviceModuleParamsSchema, converted)) {
    const first = Value.Errors(DeviceModuleParamsSchema, converted).First();
    const key = first?.path.replace(/^\//, "") || "parameters";
    throw new ModuleParamError(
      `argument '${key}' is invalid: ${first?.message ?? "unexpected value"}`,
    );
  }

  return { params: converted, internal, warnings };
}
