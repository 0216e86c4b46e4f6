import { createDashboardClient } from "@parkboard/core";
import { config } from "../config";
import { toErrorMessage } from "../utils/errors";

const SAMPLE_RIDE_LIMIT = 3;

const main = async () => {
  const host = config.serverHost === "0.0.0.0" ? "localhost" : config.serverHost;
  const baseUrl = process.env.DASHBOARD_URL ?? `http://${host}:${config.serverPort}`;
  const client = createDashboardClient({ baseUrl });

  const [state, current, stats, parks, rides] = await Promise.all([
    client.fetchDisplayState(),
    client.fetchCurrentWaits(),
    client.fetchDatabaseStats(),
    client.fetchParks(),
    client.fetchRides(),
  ]);

  const sampleRides = rides.rides.slice(0, SAMPLE_RIDE_LIMIT);
  const rideStats = await Promise.all(sampleRides.map((name) => client.fetchRideStats(name)));

  const summary = {
    baseUrl,
    display: {
      phase: state.phase,
      showing: state.currentTitle,
      position: state.queueLength > 0 ? `${state.index + 1}/${state.queueLength}` : null,
      badge: state.badge,
      nextEvent: state.nextEvent,
    },
    database: stats,
    latestSnapshot: current.waits[0]?.timestamp ?? null,
    openRides: current.waits.length,
    parks: parks.parks,
    sampleStats: rideStats.map((entry) => ({ ride: entry.rideName, ...entry.stats })),
  };

  console.log(JSON.stringify(summary, null, 2));
};

main().catch((error: unknown) => {
  console.error("Dashboard check failed:", toErrorMessage(error));
  process.exit(1);
});
