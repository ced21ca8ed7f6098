// ---------------------------------------------------------------------------
// Archive Devices – Core Types
// ---------------------------------------------------------------------------

import { Type } from "@sinclair/typebox";

export type Device = Readonly<{
  name: string;
  host: string;
  port: number;
  /** DICOM application-entity title. */
  aetitle: string;
}>;

export type DeviceState = "present" | "absent";

// ---------------------------------------------------------------------------
// Archive wire format
// ---------------------------------------------------------------------------
// Parsing checks only what is read back: the device name and the first
// connection and AE entry. Later entries and all flags are left unchecked.

export const RemoteNetworkConnectionSchema = Type.Object({
  dicomHostname: Type.String(),
  dicomPort: Type.Integer(),
});

export const RemoteNetworkAESchema = Type.Object({
  dicomAETitle: Type.String(),
});

export const RemoteDeviceSchema = Type.Object({
  dicomDeviceName: Type.String(),
  dicomNetworkConnection: Type.Array(Type.Unknown(), { minItems: 1 }),
  dicomNetworkAE: Type.Array(Type.Unknown(), { minItems: 1 }),
});

/** Document written on create and update. */
export type RemoteDevicePayload = {
  dicomDeviceName: string;
  dicomInstalled: true;
  dicomNetworkConnection: [{ cn: string; dicomHostname: string; dicomPort: number }];
  dicomNetworkAE: [
    {
      dicomAETitle: string;
      dicomAssociationInitiator: true;
      dicomAssociationAcceptor: true;
      dicomNetworkConnectionReference: [string];
    },
  ];
};

// ---------------------------------------------------------------------------
// Client capability used by reconciliation
// ---------------------------------------------------------------------------

export interface DeviceApi {
  /** `null` when the archive has no such device. */
  fetch(): Promise<Device | null>;
  /** `false` when the archive reports the device already exists. */
  create(device: Device): Promise<boolean>;
  /** `false` when the device vanished before the write. */
  update(device: Device): Promise<boolean>;
  /** `false` when there was nothing to delete. */
  delete(): Promise<boolean>;
}
