import fs from "node:fs";
import path from "node:path";
import type { FontSpec } from "../display/scene";
import { logger } from "../utils/logger";
import { DEFAULT_THEME, isThemeName, type ThemeName } from "./colors";
import rideThemeData from "./data/rideThemes.json";

export type PatternTable<T> = ReadonlyArray<readonly [pattern: string, value: T]>;

/**
 * Validates a JSON list of [pattern, value] pairs, dropping malformed rows.
 * Patterns are lower-cased so lookups can match case-insensitively.
 */
export const toPatternTable = <T extends string>(
  rows: unknown,
  isValue: (value: string) => value is T,
  source: string,
): PatternTable<T> => {
  if (!Array.isArray(rows)) return [];
  const table: Array<readonly [string, T]> = [];
  for (const row of rows) {
    if (!Array.isArray(row)) continue;
    const [pattern, value] = row;
    if (typeof pattern === "string" && typeof value === "string" && isValue(value)) {
      table.push([pattern.toLowerCase(), value]);
    } else {
      logger.warn("Skipping malformed pattern row", { source, row: JSON.stringify(row) });
    }
  }
  return table;
};

/** First pattern contained in `name` wins. */
export const matchPattern = <T>(table: PatternTable<T>, name: string): T | undefined => {
  const lowered = name.toLowerCase();
  return table.find(([pattern]) => lowered.includes(pattern))?.[1];
};

const FONT_FAMILIES: Record<string, string> = {
  orbitron: "Orbitron-Bold.ttf",
  creepster: "Creepster-Regular.ttf",
  pirata: "PirataOne-Regular.ttf",
  rye: "Rye-Regular.ttf",
  fredoka: "FredokaOne-Regular.ttf",
  luckiest: "LuckiestGuy-Regular.ttf",
  bangers: "Bangers-Regular.ttf",
  cinzel: "Cinzel-Bold.ttf",
  exo2: "Exo2-Bold.ttf",
  audiowide: "Audiowide-Regular.ttf",
};

const THEME_FONTS: Record<ThemeName, string> = {
  scifi: "orbitron",
  spooky: "creepster",
  pirate: "pirata",
  adventure: "rye",
  whimsical: "fredoka",
  playful: "luckiest",
  action: "bangers",
  fantasy: "cinzel",
  future: "exo2",
  starwars: "audiowide",
  avatar: "exo2",
  classic: "cinzel",
};

export const SYSTEM_FONT_FAMILY = "sans-serif";

export const isNonEmptyString = (value: string): value is string => value.length > 0;

export class ThemeCatalog {
  private readonly rideThemes: PatternTable<ThemeName>;
  private readonly availableFonts: Set<string>;

  constructor(assetsDir: string, rideThemes: unknown = rideThemeData) {
    this.rideThemes = toPatternTable(rideThemes, isThemeName, "rideThemes");
    this.availableFonts = new Set(
      Object.entries(FONT_FAMILIES)
        .filter(([, file]) => fs.existsSync(path.join(assetsDir, "fonts", file)))
        .map(([family]) => family),
    );
    const missing = Object.keys(FONT_FAMILIES).filter((family) => !this.availableFonts.has(family));
    if (missing.length > 0) {
      logger.debug("Theme fonts missing; falling back to the system font", { missing });
    }
    logger.info("Theme catalog ready", { themes: this.rideThemes.length, fonts: this.availableFonts.size });
  }

  themeForRide(rideName: string): ThemeName {
    return matchPattern(this.rideThemes, rideName) ?? DEFAULT_THEME;
  }

  font(theme: ThemeName, size: number): FontSpec {
    const family = THEME_FONTS[theme];
    const file = FONT_FAMILIES[family];
    if (file && this.availableFonts.has(family)) {
      return { family, file: `/assets/fonts/${file}`, size };
    }
    return { family: SYSTEM_FONT_FAMILY, file: null, size };
  }
}
