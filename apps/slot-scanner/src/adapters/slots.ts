import { SlotListSchema, toTimedSlot, type TimedSlot } from "@slot-scanner/shared";
import { SlotFetchError, SlotResponseError } from "../errors.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SlotClientOptions {
  timeoutMs: number;
  fetch?: FetchLike;
}

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/**
 * GETs the slot list and returns it parsed. Every failure surfaces as
 * SlotFetchError (transport/status) or SlotResponseError (payload).
 */
export async function fetchSlots(
  url: string,
  opts: SlotClientOptions,
): Promise<TimedSlot[]> {
  const doFetch = opts.fetch ?? fetch;

  let res: Response;
  try {
    res = await doFetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new SlotFetchError(`Request timed out after ${opts.timeoutMs}ms`, {
        cause: err,
      });
    }
    throw new SlotFetchError(`Request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!res.ok) {
    const failure = new SlotFetchError(`Request failed with status ${res.status}`, {
      status: res.status,
    });
    // Unread bodies hold the connection until collected
    await res.body?.cancel(failure);
    throw failure;
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new SlotResponseError("Response body is not valid JSON", { cause: err });
  }

  const parsed = SlotListSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new SlotResponseError(`Unexpected response shape: ${detail}`, {
      cause: parsed.error,
    });
  }

  try {
    return parsed.data.map(toTimedSlot);
  } catch (err) {
    throw new SlotResponseError(errorMessage(err), { cause: err });
  }
}
