import type { IncidentStreamEvent } from "../types/api.js";

export function toSseFrame(event: IncidentStreamEvent): string {
  const { type, ...payload } = event;
  return `event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`;
}
