export const DEFAULT_SLOTS_API_URL =
  "https://ttp.cbp.dhs.gov/schedulerapi/slots";

export interface SlotQuery {
  baseUrl: string;
  locationId: number;
  limit: number;
}

// GET <base>?orderBy=soonest&limit={limit}&locationId={location}&minimum=1
export function buildSlotsUrl(q: SlotQuery): string {
  const url = new URL(q.baseUrl);
  url.searchParams.set("orderBy", "soonest");
  url.searchParams.set("limit", String(q.limit));
  url.searchParams.set("locationId", String(q.locationId));
  url.searchParams.set("minimum", "1");
  return url.toString();
}
