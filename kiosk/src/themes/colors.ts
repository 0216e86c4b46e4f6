import type { WaitCategory } from "@parkboard/core";
import type { Rgb } from "../display/scene";

export const THEMES = [
  "scifi",
  "spooky",
  "pirate",
  "adventure",
  "whimsical",
  "playful",
  "action",
  "fantasy",
  "future",
  "starwars",
  "avatar",
  "classic",
] as const;

export type ThemeName = (typeof THEMES)[number];

export const DEFAULT_THEME: ThemeName = "classic";

export const isThemeName = (value: string): value is ThemeName => THEMES.some((theme) => theme === value);

export interface ColorScheme {
  background: Rgb;
  accent: Rgb;
  textPrimary: Rgb;
  textSecondary: Rgb;
}

const WHITE: Rgb = [255, 255, 255];
const GREY: Rgb = [180, 180, 180];

const scheme = (background: Rgb, accent: Rgb, textSecondary: Rgb = GREY): ColorScheme => ({
  background,
  accent,
  textPrimary: WHITE,
  textSecondary,
});

export const THEME_COLORS: Record<ThemeName, ColorScheme> = {
  scifi: scheme([10, 10, 25], [76, 201, 240]),
  spooky: scheme([25, 10, 25], [128, 19, 54], [150, 130, 150]),
  pirate: scheme([20, 15, 10], [201, 162, 39], [180, 160, 130]),
  adventure: scheme([15, 35, 25], [149, 213, 178]),
  whimsical: scheme([40, 35, 50], [255, 159, 28], [200, 190, 210]),
  playful: scheme([30, 30, 45], [255, 107, 107]),
  action: scheme([15, 15, 20], [255, 65, 54]),
  fantasy: scheme([25, 20, 35], [180, 130, 255], [190, 180, 200]),
  future: scheme([15, 20, 30], [100, 200, 255]),
  starwars: scheme([5, 5, 10], [255, 69, 0]),
  avatar: scheme([5, 20, 25], [0, 255, 200]),
  classic: scheme([20, 20, 30], [255, 215, 0]),
};

export const WAIT_COLORS: Record<WaitCategory, Rgb> = {
  short: [46, 204, 113],
  moderate: [241, 196, 15],
  long: [230, 126, 34],
  very_long: [231, 76, 60],
};

export const STATUS_COLORS = {
  warning: [255, 193, 7],
  error: [220, 53, 69],
  closed: [231, 76, 60],
} as const satisfies Record<string, Rgb>;

export const colorScheme = (theme: ThemeName): ColorScheme => THEME_COLORS[theme];

export const blendColors = (from: Rgb, to: Rgb, ratio = 0.5): Rgb => [
  Math.trunc(from[0] * (1 - ratio) + to[0] * ratio),
  Math.trunc(from[1] * (1 - ratio) + to[1] * ratio),
  Math.trunc(from[2] * (1 - ratio) + to[2] * ratio),
];

/** Scales each channel, e.g. for particles fading with their remaining life. */
export const scaleColor = (color: Rgb, factor: number): Rgb => [
  Math.trunc(color[0] * factor),
  Math.trunc(color[1] * factor),
  Math.trunc(color[2] * factor),
];

export const brighten = (color: Rgb, amount: number): Rgb => [
  Math.min(255, color[0] + amount),
  Math.min(255, color[1] + amount),
  Math.min(255, color[2] + amount),
];
