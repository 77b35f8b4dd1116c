export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export type PushEvent = "status_changed" | "deadline_approaching";

export interface PushMessage {
  event: PushEvent;
  task_id: string;
  subject: string;
  message: string;
  /** User ids the alert is addressed to. */
  recipients: string[];
}

/** Outbound email relay. Implementations throw UpstreamError on failure. */
export interface EmailChannel {
  send(message: EmailMessage): Promise<void>;
}

/** Push/broadcast topic. Implementations throw UpstreamError on failure. */
export interface PushChannel {
  publish(message: PushMessage): Promise<void>;
}
