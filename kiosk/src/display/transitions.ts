import type { TransitionType } from "../config";
import type { Surface } from "./scene";

export interface Layer {
  surface: Surface;
  offsetX: number;
  offsetY: number;
  /** 0-1 */
  opacity: number;
}

export type TransitionFn = (previous: Surface, next: Surface, progress: number, width: number) => Layer[];

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export const crossfade: TransitionFn = (previous, next, progress) => [
  { surface: previous, offsetX: 0, offsetY: 0, opacity: 1 },
  { surface: next, offsetX: 0, offsetY: 0, opacity: clamp01(progress) },
];

export const easeInOut = (t: number) => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2);

export const slideLeft: TransitionFn = (previous, next, progress, width) => {
  const offset = Math.trunc(width * easeInOut(clamp01(progress)));
  return [
    { surface: previous, offsetX: -offset, offsetY: 0, opacity: 1 },
    { surface: next, offsetX: width - offset, offsetY: 0, opacity: 1 },
  ];
};

const TRANSITIONS: Record<TransitionType, TransitionFn> = {
  crossfade,
  slide_left: slideLeft,
};

export const getTransition = (type: string): TransitionFn =>
  type === "crossfade" || type === "slide_left" ? TRANSITIONS[type] : crossfade;
