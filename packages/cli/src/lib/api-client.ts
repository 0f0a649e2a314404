/**
 * HTTP API client for the fleetdeck server.
 *
 * Wraps the device and command endpoints with typed request/response
 * handling:
 *   - Configurable timeouts via AbortSignal.timeout
 *   - Structured error handling (ApiError for HTTP errors, ApiConnectionError,
 *     a NetworkError, for failures before any response arrived)
 *   - Response envelope unwrapping ({ device }, { command }, ...)
 */

import {
  NetworkError,
  type Command,
  type CommandKind,
  type Device,
  type TransitionResult,
} from "@fleetdeck/shared";
import { resolveConfig, type FleetdeckConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Error Classes
// ---------------------------------------------------------------------------

/**
 * HTTP 4xx/5xx error from the server.
 * Carries the status code, the server's error code when it sent one, and
 * the parsed body for debugging.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code?: string;
  readonly body?: unknown;

  constructor(message: string, statusCode: number, body?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.body = body;
    if (isRecord(body) && typeof body.code === "string") {
      this.code = body.code;
    }
  }
}

/**
 * No response from the server: DNS resolution, connection refused, timeout.
 * Code NETWORK_TIMEOUT when the request timed out, NETWORK_UNREACHABLE
 * otherwise. Wraps the underlying cause for debugging.
 */
export class ApiConnectionError extends NetworkError {
  readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      cause?.name === "TimeoutError" ? "NETWORK_TIMEOUT" : "NETWORK_UNREACHABLE",
      cause ? { cause: cause.message } : {},
    );
    this.name = "ApiConnectionError";
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Response Types
// ---------------------------------------------------------------------------

/** GET /api/devices/:id */
export interface DeviceDetailResponse {
  device: Device;
  in_flight: Command[];
  recent_commands: Command[];
}

/** POST /api/commands/:id/ack and /cancel */
export interface CommandTransitionResponse {
  transition: TransitionResult;
  command: Command;
}

/** GET /api/health */
export interface HealthStatus {
  status: "ok";
  devices: number;
  in_flight: number;
  ws_clients: number;
  device_connections: number;
  uptime: number;
  version: string;
}

// ---------------------------------------------------------------------------
// FleetApiClient
// ---------------------------------------------------------------------------

export class FleetApiClient {
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(opts: { baseUrl: string; timeout?: number }) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeout = opts.timeout ?? 10_000;
  }

  /** Create a client from the resolved CLI config (file plus FLEETDECK_URL) */
  static fromConfig(config?: FleetdeckConfig): FleetApiClient {
    const cfg = config ?? resolveConfig();
    return new FleetApiClient({ baseUrl: cfg.backend.url, timeout: cfg.backend.timeout_ms });
  }

  /** Origin the client talks to, for building the WebSocket URL */
  get url(): string {
    return this.baseUrl;
  }

  // -------------------------------------------------------------------------
  // Core HTTP helper
  // -------------------------------------------------------------------------

  /**
   * Execute an HTTP request against the server.
   *
   * On non-2xx responses the server's `error` field becomes the message,
   * falling back to the status line. Empty bodies parse as null.
   */
  private async request<T>(
    method: "GET" | "POST" | "PATCH" | "DELETE",
    path: string,
    options?: { body?: unknown },
  ): Promise<T> {
    // baseUrl must be origin-only: new URL() drops path components from the base
    const url = new URL(path, this.baseUrl);

    const headers: Record<string, string> = { Accept: "application/json" };
    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeout),
    };
    if (options?.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(url.toString(), init);
      text = await response.text();
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new ApiConnectionError(`Failed to ${method} ${path}: ${cause.message}`, cause);
    }

    if (!response.ok) {
      let body: unknown = text;
      try {
        body = JSON.parse(text);
      } catch {
        // Non-JSON error page; keep the raw text
      }
      const message =
        isRecord(body) && typeof body.error === "string"
          ? body.error
          : `HTTP ${response.status}: ${response.statusText}`;
      throw new ApiError(message, response.status, body);
    }

    try {
      const parsed: T = JSON.parse(text.length > 0 ? text : "null");
      return parsed;
    } catch {
      throw new ApiError(
        `Failed to parse response from ${method} ${path} as JSON`,
        response.status,
        text,
      );
    }
  }

  // -------------------------------------------------------------------------
  // Device Endpoints
  // -------------------------------------------------------------------------

  /** List every device in registration order */
  async listDevices(): Promise<Device[]> {
    const res = await this.request<{ devices: Device[] }>("GET", "/api/devices");
    return res.devices;
  }

  /** Device snapshot with its in-flight and recent commands */
  async getDevice(id: string): Promise<DeviceDetailResponse> {
    return this.request<DeviceDetailResponse>("GET", `/api/devices/${encodeURIComponent(id)}`);
  }

  // -------------------------------------------------------------------------
  // Command Endpoints
  // -------------------------------------------------------------------------

  /** Issue a command; rejections surface as ApiError with the server's code */
  async issueCommand(deviceId: string, kind: CommandKind): Promise<Command> {
    const res = await this.request<{ command: Command }>(
      "POST",
      `/api/devices/${encodeURIComponent(deviceId)}/commands`,
      { body: { kind } },
    );
    return res.command;
  }

  async getCommand(id: string): Promise<Command> {
    const res = await this.request<{ command: Command }>(
      "GET",
      `/api/commands/${encodeURIComponent(id)}`,
    );
    return res.command;
  }

  async cancelCommand(id: string): Promise<CommandTransitionResponse> {
    return this.request<CommandTransitionResponse>(
      "POST",
      `/api/commands/${encodeURIComponent(id)}/cancel`,
    );
  }

  // -------------------------------------------------------------------------
  // System Endpoints
  // -------------------------------------------------------------------------

  async getHealth(): Promise<HealthStatus> {
    return this.request<HealthStatus>("GET", "/api/health");
  }

  /** Returns true if the server answers its health check. Never throws. */
  async health(): Promise<boolean> {
    try {
      await this.getHealth();
      return true;
    } catch {
      return false;
    }
  }
}
