import { displayWait, openRides } from "@parkboard/core";
import type { LogLevel } from "./config";
import { isTestEventKind, TEST_EVENT_KINDS, type TestEventKind } from "./events/scheduler";
import { allOpenRides, type WaitTimesData } from "./models/waitTimes";
import { StartupError } from "./utils/errors";

export interface CliOptions {
  textOnly: boolean;
  fullscreen: boolean;
  testEvent: TestEventKind | null;
  eventsConfigPath: string | null;
  logLevel: LogLevel | null;
  consoleLog: boolean;
  help: boolean;
}

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
};

const BOOLEAN_FLAGS = new Set(["--text-only", "--fullscreen", "--no-console-log", "--help", "-h"]);
const VALUE_FLAGS = new Set(["--test-event", "--events-config", "--log-level"]);

export const usage = () =>
  [
    "Usage: parkboard [options]",
    "",
    "  --text-only                 Print the current wait times and exit",
    "  --fullscreen                Ask the display client to go fullscreen",
    `  --test-event <kind>         Run a synthetic event now (${TEST_EVENT_KINDS.join(", ")})`,
    "  --events-config <path>      Event schedule JSON (default: config/events.json)",
    "  --log-level <level>         debug, info, warn or error",
    "  --no-console-log            Log to LOG_FILE only",
    "  -h, --help                  Show this message",
  ].join("\n");

const invalid = (message: string) => new StartupError(`${message}\n\n${usage()}`, 1);

export const parseArgs = (argv: readonly string[]): CliOptions => {
  const options: CliOptions = {
    textOnly: false,
    fullscreen: false,
    testEvent: null,
    eventsConfigPath: null,
    logLevel: null,
    consoleLog: true,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    if (BOOLEAN_FLAGS.has(flag)) {
      if (flag !== arg) throw invalid(`${flag} does not take a value`);
      if (flag === "--text-only") options.textOnly = true;
      else if (flag === "--fullscreen") options.fullscreen = true;
      else if (flag === "--no-console-log") options.consoleLog = false;
      else options.help = true;
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) throw invalid(`Unknown argument: ${arg}`);

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw invalid(`${flag} expects a value`);
    }

    if (flag === "--test-event") {
      if (!isTestEventKind(value)) throw invalid(`Unknown test event: ${value}`);
      options.testEvent = value;
    } else if (flag === "--log-level") {
      const level = LOG_LEVELS[value.toLowerCase()];
      if (!level) throw invalid(`Unknown log level: ${value}`);
      options.logLevel = level;
    } else {
      options.eventsConfigPath = value;
    }
  }

  return options;
};

const RULE = "=".repeat(60);
const SUB_RULE = "-".repeat(40);

/** "09:05 PM" in local time. */
export const formatClockTime = (date: Date) => {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getMinutes()).padStart(2, "0");
  return `${String(hour12).padStart(2, "0")}:${minutes} ${hours < 12 ? "AM" : "PM"}`;
};

export const formatTextSummary = (data: WaitTimesData): string => {
  const lines = ["", RULE, "THEME PARK WAIT TIMES", RULE];

  data.parks.forEach((park) => {
    lines.push("", park.name, SUB_RULE);
    const rides = openRides(park);
    if (rides.length === 0) {
      lines.push("  No rides currently reporting wait times");
      return;
    }
    [...rides]
      .sort((a, b) => b.waitTime - a.waitTime)
      .forEach((ride) => lines.push(`  ${ride.name}: ${displayWait(ride)}`));
  });

  lines.push("", RULE, `Total open rides: ${allOpenRides(data).length}`);
  if (data.lastFetch) lines.push(`Data fetched at: ${formatClockTime(data.lastFetch)}`);
  lines.push(RULE, "");
  return lines.join("\n");
};
