import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { formatClockTime, formatTextSummary, parseArgs } from "../cli";
import { StartupError } from "../utils/errors";
import { isRecord } from "../utils/json";
import { magicKingdomData, makePark, makeRide } from "./helpers";

test("no arguments gives the defaults", () => {
  assert.deepEqual(parseArgs([]), {
    textOnly: false,
    fullscreen: false,
    testEvent: null,
    eventsConfigPath: null,
    logLevel: null,
    consoleLog: true,
    help: false,
  });
});

test("flags and values are read in either spelling", () => {
  const options = parseArgs([
    "--text-only",
    "--fullscreen",
    "--test-event=fireworks-epcot",
    "--events-config",
    "custom/events.json",
    "--log-level=WARNING",
    "--no-console-log",
  ]);
  assert.equal(options.textOnly, true);
  assert.equal(options.fullscreen, true);
  assert.equal(options.testEvent, "fireworks-epcot");
  assert.equal(options.eventsConfigPath, "custom/events.json");
  assert.equal(options.logLevel, "warn");
  assert.equal(options.consoleLog, false);
  assert.equal(parseArgs(["-h"]).help, true);
});

test("bad arguments are startup errors with exit code 1", () => {
  const cases = [["--bogus"], ["--test-event", "laser-show"], ["--log-level"], ["--log-level", "--text-only"], ["--fullscreen=yes"]];
  for (const argv of cases) {
    assert.throws(
      () => parseArgs(argv),
      (error: unknown) => error instanceof StartupError && error.exitCode === 1,
      argv.join(" "),
    );
  }
});

test("clock times use a zero-padded 12-hour clock", () => {
  assert.equal(formatClockTime(new Date(2026, 5, 10, 21, 5)), "09:05 PM");
  assert.equal(formatClockTime(new Date(2026, 5, 10, 0, 30)), "12:30 AM");
  assert.equal(formatClockTime(new Date(2026, 5, 10, 12, 0)), "12:00 PM");
});

test("the text summary lists open rides by wait, park by park", () => {
  const data = magicKingdomData(
    [
      makeRide({ id: 1, name: "Jungle Cruise", waitTime: 15 }),
      makeRide({ id: 2, name: "Space Mountain", waitTime: 60 }),
      makeRide({ id: 3, name: "Dumbo", waitTime: 0 }),
    ],
    new Date(2026, 5, 10, 21, 5),
  );
  data.parks.set("epcot", makePark("EPCOT", "epcot", []));

  const rule = "=".repeat(60);
  assert.equal(
    formatTextSummary(data),
    [
      "",
      rule,
      "THEME PARK WAIT TIMES",
      rule,
      "",
      "Magic Kingdom",
      "-".repeat(40),
      "  Space Mountain: 60 min",
      "  Jungle Cruise: 15 min",
      "",
      "EPCOT",
      "-".repeat(40),
      "  No rides currently reporting wait times",
      "",
      rule,
      "Total open rides: 2",
      "Data fetched at: 09:05 PM",
      rule,
      "",
    ].join("\n"),
  );
});

test("the installed command launches the kiosk entry point from source", () => {
  const root = path.resolve(__dirname, "../../..");
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(root, "package.json"), "utf8"));
  const bin = isRecord(manifest) ? manifest.bin : undefined;
  const launcher = isRecord(bin) ? bin.parkboard : undefined;
  assert.equal(launcher, "bin/parkboard.js");

  const lines = fs.readFileSync(path.join(root, "bin", "parkboard.js"), "utf8").split("\n");
  assert.equal(lines[0], "#!/usr/bin/env node");
  assert.ok(lines.includes('require("tsx/cjs");'));
  assert.ok(lines.includes('require("../kiosk/src/index.ts");'));
  assert.equal(fs.existsSync(path.join(root, "kiosk", "src", "index.ts")), true);
});
