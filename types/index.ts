export type EventSource = "text" | "detail" | "external-structured" | "external-fallback";

/**
 * One event as delivered downstream.
 * date is dd.mm.yyyy whenever the source allowed it; time and location are free text.
 */
export interface EventRecord {
  uid: string;
  title: string;
  date: string;
  time: string;
  location: string;
  url: string;
  source: EventSource;
}

export type DeliveryFailurePolicy = "abort" | "continue";

export const DEFAULT_USER_AGENT = "council-event-ticker/1.0";
