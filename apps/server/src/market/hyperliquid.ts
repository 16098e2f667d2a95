/**
 * Read-only client for the Hyperliquid info endpoint.
 * Fetches a wallet's fills and clearinghouse state and translates transport
 * failures into ProviderError kinds. No retries: retrying is up to the caller.
 */

import { createHash } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

import { accountStateSchema, fillsResponseSchema } from "@shared/schemas";
import type { AccountState, Fill, TradeRecord } from "@shared/types/journal";
import { formatJournalTime } from "@shared/utils/time";

import { ProviderError } from "../errors";
import type { ProviderFailureKind } from "../errors";
import { logger } from "../logger";

const log = logger.child({ module: "hyperliquid" });

export const DEFAULT_HYPERLIQUID_URL = "https://api.hyperliquid.xyz";

export interface TradeData {
  fills: Fill[];
  userState: AccountState;
}

export interface TradeDataProvider {
  fetchTradeData(walletAddress: string): Promise<TradeData>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HyperliquidClientOptions {
  baseUrl?: string;
  /** Per-request timeout; omitted means the request may block indefinitely. */
  timeoutMs?: number;
  /** Pause between the fills and state requests. */
  requestGapMs?: number;
  fetchImpl?: FetchLike;
}

/** Maps an error message or HTTP body onto a failure kind. */
export function classifyProviderFailure(message: string, status?: number): ProviderFailureKind {
  const lower = message.toLowerCase();
  if (status === 429 || lower.includes("rate limit") || lower.includes("too many requests")) {
    return "RateLimited";
  }
  if (lower.includes("timeout") || lower.includes("timed out") || status === 408 || status === 504) {
    return "Timeout";
  }
  if (lower.includes("invalid address") || ((status === 400 || status === 422) && lower.includes("address"))) {
    return "InvalidAddress";
  }
  return "Unknown";
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export class HyperliquidClient implements TradeDataProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly requestGapMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HyperliquidClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_HYPERLIQUID_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.requestGapMs = options.requestGapMs ?? 0;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchTradeData(walletAddress: string): Promise<TradeData> {
    const rawFills = await this.info({ type: "userFills", user: walletAddress });
    const fills = fillsResponseSchema.safeParse(rawFills);
    if (!fills.success) {
      throw new ProviderError("Unknown", "Unexpected fills payload.", { cause: fills.error });
    }

    if (this.requestGapMs > 0) {
      await sleep(this.requestGapMs);
    }

    const rawState = await this.info({ type: "clearinghouseState", user: walletAddress });
    const userState = accountStateSchema.safeParse(rawState ?? {});
    if (!userState.success) {
      throw new ProviderError("Unknown", "Unexpected account state payload.", { cause: userState.error });
    }

    log.info({ walletAddress, fills: fills.data.length }, "Fetched trade data");
    return { fills: fills.data, userState: userState.data };
  }

  private async info(body: Record<string, string>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/info`, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(body),
        ...(this.timeoutMs !== undefined ? { signal: AbortSignal.timeout(this.timeoutMs) } : {}),
      });
    } catch (error) {
      throw this.transportFailure(error, body.type);
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (error) {
      // An error status without a readable body is still classified by status
      if (response.ok || isAbortLike(error)) {
        throw this.transportFailure(error, body.type);
      }
      raw = "";
    }

    if (!response.ok) {
      const kind = classifyProviderFailure(raw, response.status);
      log.warn(
        { status: response.status, request: body.type, kind, body: raw.slice(0, 300) },
        "Provider returned an error status",
      );
      throw new ProviderError(kind, `HTTP ${response.status}`);
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new ProviderError("Unknown", "Response was not valid JSON.", { cause: error });
    }
  }

  /** Maps a failed send or body read; an aborted signal means the timeout fired. */
  private transportFailure(error: unknown, request: string | undefined): ProviderError {
    const kind = isAbortLike(error)
      ? "Timeout"
      : classifyProviderFailure(error instanceof Error ? error.message : String(error));
    log.warn({ err: error, request, kind }, "Provider request failed");
    return new ProviderError(kind, error instanceof Error ? error.message : undefined, { cause: error });
  }
}

/** Stable id for fills that carry no order id. */
function fillFingerprint(fill: Fill): string {
  const digest = createHash("sha1")
    .update(JSON.stringify([fill.coin, fill.side, fill.sz, fill.px, fill.time, fill.closedPnl, fill.fee]))
    .digest("hex");
  return `api-${digest.slice(0, 12)}`;
}

export function fillToTradeRecord(fill: Fill, timeZone: string = "UTC"): TradeRecord {
  return {
    id: fill.oid !== undefined ? String(fill.oid) : fillFingerprint(fill),
    coin: fill.coin || "Unknown",
    side: fill.side === "B" ? "Long" : "Short",
    size: fill.sz,
    price: fill.px,
    pnl: fill.closedPnl,
    fee: fill.fee,
    time: formatJournalTime(fill.time, timeZone),
    type: "API Trade",
  };
}
