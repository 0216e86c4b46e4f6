import test from "node:test";
import assert from "node:assert/strict";
import { buildUrl, createDashboardClient } from "../api/endpoints";
import type { FetchLike } from "../api/types";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

test("buildUrl joins paths and skips undefined query values", () => {
  assert.equal(
    buildUrl("http://kiosk.local:8080/", "api/history/Space", { hours: 6, days: undefined }),
    "http://kiosk.local:8080/api/history/Space?hours=6",
  );
});

test("dashboard client encodes ride names and forwards query params", async () => {
  const requested: string[] = [];
  const fetchImpl: FetchLike = async (input) => {
    requested.push(input);
    return jsonResponse({ rideName: "Peter Pan's Flight", hours: 12, history: [] });
  };
  const client = createDashboardClient({ baseUrl: "http://kiosk.local:8080", fetchImpl });

  const response = await client.fetchRideHistory("Peter Pan's Flight", 12);

  assert.equal(response.hours, 12);
  assert.deepEqual(requested, ["http://kiosk.local:8080/api/history/Peter%20Pan's%20Flight?hours=12"]);
});

test("dashboard client rejects non-2xx responses", async () => {
  const fetchImpl: FetchLike = async () => jsonResponse({ error: "internal_error" }, 500);
  const client = createDashboardClient({ baseUrl: "http://kiosk.local:8080", fetchImpl });

  await assert.rejects(() => client.fetchParks(), /Parkboard API request failed \(500\)/);
});
