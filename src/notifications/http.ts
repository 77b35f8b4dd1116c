import { UpstreamError } from "../errors.js";
import type { EmailChannel, EmailMessage, PushChannel, PushMessage } from "./types.js";

export const REQUEST_TIMEOUT_MS = 5000;

export interface HttpChannelOptions {
  endpoint: string;
  apiKey?: string | null;
  timeoutMs?: number;
}

async function postJson(
  service: string,
  options: HttpChannelOptions,
  body: unknown,
): Promise<void> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? REQUEST_TIMEOUT_MS);
  let res: Response;
  try {
    res = await fetch(options.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    const reason = controller.signal.aborted
      ? "request timed out"
      : err instanceof Error
        ? err.message
        : String(err);
    throw new UpstreamError(service, reason, { cause: err });
  } finally {
    clearTimeout(timer);
  }

  // Only the status matters; release the connection.
  await res.body?.cancel();
  if (!res.ok) {
    throw new UpstreamError(service, `responded with HTTP ${res.status}`);
  }
}

/** Sends mail through an HTTP relay that accepts `{ from, to, subject, text }`. */
export class HttpEmailRelay implements EmailChannel {
  constructor(private options: HttpChannelOptions) {}

  send(message: EmailMessage): Promise<void> {
    return postJson("email relay", this.options, message);
  }
}

/** Publishes alerts to an HTTP topic endpoint (webhook fan-out). */
export class HttpPushTopic implements PushChannel {
  constructor(private options: HttpChannelOptions) {}

  publish(message: PushMessage): Promise<void> {
    return postJson("push topic", this.options, message);
  }
}
