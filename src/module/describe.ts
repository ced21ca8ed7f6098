// ---------------------------------------------------------------------------
// Module documentation – printed by `archive-device --describe`
// ---------------------------------------------------------------------------

import { DeviceModuleParamsSchema, MODULE_NAME } from "./params.js";

export type ModuleDescription = {
  module: string;
  short_description: string;
  description: string;
  options: typeof DeviceModuleParamsSchema;
  aliases: Record<string, string>;
  supports_check_mode: boolean;
  returns: Record<string, { description: string; type: string; sample: unknown }>;
  example: Record<string, unknown>;
};

export function describeModule(): ModuleDescription {
  return {
    module: MODULE_NAME,
    short_description: "Manage DICOM devices on an archive server",
    description:
      "Ensures a DICOM device (name, host, port, AE title) exists with the given attributes, or is absent, through the archive's HTTP/JSON management API.",
    options: DeviceModuleParamsSchema,
    aliases: { device: "name" },
    supports_check_mode: false,
    returns: {
      name: { description: "Name of device", type: "string", sample: "workstation42" },
      state: { description: "Current state of the device", type: "string", sample: "present" },
      changed: { description: "Was the device changed?", type: "boolean", sample: true },
    },
    example: {
      api_url: "http://10.0.0.5:8080/dcm4chee-arc/",
      name: "workstation23",
      host: "10.0.0.100",
      port: 11112,
      aetitle: "HELLOWORLD",
      state: "present",
    },
  };
}
