/**
 * HTTP client for one device resource on the archive's management API.
 *
 * Each client is bound to a single `{apiUrl}devices/{name}` URL. The status
 * codes the archive uses to say "no such device" (404) or "already exists"
 * (409) come back as ordinary return values; everything else throws.
 */

import type { Device, DeviceApi } from "./types.js";
import { deviceFromRemote, deviceToRemotePayload } from "./device.js";
import { ArchiveConnectionError, ArchiveHttpError, type HttpMethod } from "./errors.js";
import { silentLogger, type SubsystemLogger } from "../logging/subsystem.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type DeviceApiClientOptions = {
  fetch?: FetchLike;
  log?: SubsystemLogger;
};

const STATUS_NOT_FOUND = 404;
const STATUS_CONFLICT = 409;

export function resolveDeviceUrl(apiUrl: string, name: string): string {
  return `${apiUrl}devices/${name}`;
}

export class DeviceApiClient implements DeviceApi {
  readonly url: string;
  private readonly fetchImpl: FetchLike;
  private readonly log: SubsystemLogger;

  constructor(apiUrl: string, name: string, opts: DeviceApiClientOptions = {}) {
    this.url = resolveDeviceUrl(apiUrl, name);
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.log = opts.log ?? silentLogger;
  }

  async fetch(): Promise<Device | null> {
    const res = await this.request("GET", undefined, STATUS_NOT_FOUND);
    if (!res) {
      return null;
    }
    return deviceFromRemote(await res.text());
  }

  async create(device: Device): Promise<boolean> {
    return this.write("POST", deviceToRemotePayload(device), STATUS_CONFLICT);
  }

  async update(device: Device): Promise<boolean> {
    return this.write("PUT", deviceToRemotePayload(device), STATUS_NOT_FOUND);
  }

  async delete(): Promise<boolean> {
    return this.write("DELETE", undefined, STATUS_NOT_FOUND);
  }

  /** Writes only report whether they happened; the response body is released unread. */
  private async write(
    method: HttpMethod,
    body: string | undefined,
    ignoreStatus: number,
  ): Promise<boolean> {
    const res = await this.request(method, body, ignoreStatus);
    if (!res) {
      return false;
    }
    await res.body?.cancel();
    return true;
  }

  /**
   * Resolves to `null` when the archive answers with `ignoreStatus`, to the
   * response on 2xx, and rejects on anything else.
   */
  private async request(
    method: HttpMethod,
    body: string | undefined,
    ignoreStatus: number,
  ): Promise<Response | null> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method,
        headers: { "Content-Type": "application/json" },
        body,
      });
    } catch (err) {
      throw new ArchiveConnectionError(method, this.url, err);
    }

    this.log.debug(`${method} ${this.url} -> ${res.status}`);

    if (res.status === ignoreStatus) {
      await res.body?.cancel();
      return null;
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new ArchiveHttpError({
        status: res.status,
        statusText: res.statusText,
        method,
        url: this.url,
        body: text,
      });
    }
    return res;
  }
}
