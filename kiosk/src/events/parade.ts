import type { DrawTarget, Point, Rgb } from "../display/scene";
import { brighten, scaleColor } from "../themes/colors";
import type { AnimationDriver } from "./drivers";
import { pick, randomInt, uniform, type RandomSource } from "./random";

const COLORS: readonly [Rgb, ...Rgb[]] = [
  [255, 0, 0],
  [255, 165, 0],
  [255, 255, 0],
  [0, 255, 0],
  [0, 191, 255],
  [138, 43, 226],
  [255, 20, 147],
  [255, 215, 0],
];

const STAR_COLOR: Rgb = [255, 255, 200];
const STRING_COLOR: Rgb = [150, 150, 150];
const SPARKLE_COLOR: Rgb = [255, 215, 50];
const FRAME_SCALE = 60;
const EDGE_MARGIN = 50;
const BANNER_HEIGHT = 40;
const BANNER_SPARKLES = 20;
const INITIAL_SPAWN_INTERVAL = 0.1;

export type ParadeElementKind = "balloon" | "confetti" | "star";

export interface ParadeElement {
  kind: ParadeElementKind;
  x: number;
  y: number;
  vx: number;
  vy: number;
  color: Rgb;
  size: number;
  rotation: number;
  rotationSpeed: number;
}

export class ParadeDriver implements AnimationDriver {
  private readonly width: number;
  private readonly height: number;
  private readonly random: RandomSource;
  private elementList: ParadeElement[] = [];
  private spawnTimer = 0;
  private spawnInterval = INITIAL_SPAWN_INTERVAL;
  private elapsed = 0;

  constructor(width: number, height: number, random: RandomSource = Math.random) {
    this.width = width;
    this.height = height;
    this.random = random;
  }

  get elements(): readonly ParadeElement[] {
    return this.elementList;
  }

  /** Horizontal banner scroll in pixels, derived from elapsed time only. */
  get bannerOffset() {
    return (this.elapsed * 50) % this.width;
  }

  reset() {
    this.elementList = [];
    this.spawnTimer = 0;
    this.spawnInterval = INITIAL_SPAWN_INTERVAL;
    this.elapsed = 0;
  }

  update(dt: number, elapsed: number) {
    this.elapsed = elapsed;

    this.spawnTimer += dt;
    if (this.spawnTimer > this.spawnInterval) {
      this.spawn();
      this.spawnTimer = 0;
      this.spawnInterval = uniform(this.random, 0.05, 0.15);
    }

    const step = dt * FRAME_SCALE;
    for (const element of this.elementList) {
      element.x += element.vx * step;
      element.y += element.vy * step;
      element.rotation += element.rotationSpeed * step;
      if (element.kind === "balloon") {
        element.x += Math.sin(elapsed * 2 + element.y * 0.05) * 0.5 * step;
      }
    }
    this.elementList = this.elementList.filter(
      (element) =>
        element.x >= -EDGE_MARGIN &&
        element.x <= this.width + EDGE_MARGIN &&
        element.y >= -EDGE_MARGIN &&
        element.y <= this.height + EDGE_MARGIN,
    );
  }

  private spawnKind(): ParadeElementKind {
    const roll = this.random();
    if (roll < 0.3) return "balloon";
    if (roll < 0.8) return "confetti";
    return "star";
  }

  private spawn() {
    const kind = this.spawnKind();
    const color = pick(this.random, COLORS);
    const x = randomInt(this.random, 0, this.width);
    const base = { kind, x, color, rotation: 0, rotationSpeed: 0 };

    switch (kind) {
      case "balloon":
        this.elementList.push({
          ...base,
          y: this.height + 20,
          vx: uniform(this.random, -0.5, 0.5),
          vy: uniform(this.random, -3, -1.5),
          size: uniform(this.random, 15, 25),
        });
        return;
      case "confetti":
        this.elementList.push({
          ...base,
          y: -10,
          vx: uniform(this.random, -1, 1),
          vy: uniform(this.random, 2, 4),
          size: uniform(this.random, 6, 12),
          rotationSpeed: uniform(this.random, -5, 5),
        });
        return;
      case "star":
        this.elementList.push({
          ...base,
          color: STAR_COLOR,
          y: randomInt(this.random, 0, Math.trunc(this.height * 0.6)),
          vx: 0,
          vy: 0,
          size: uniform(this.random, 3, 8),
        });
        return;
    }
  }

  render(target: DrawTarget) {
    for (const element of this.elementList) {
      switch (element.kind) {
        case "balloon":
          this.drawBalloon(target, element);
          break;
        case "confetti":
          this.drawConfetti(target, element);
          break;
        case "star":
          this.drawStar(target, element);
          break;
      }
    }
    this.drawBanner(target);
  }

  private drawBalloon(target: DrawTarget, element: ParadeElement) {
    const x = Math.trunc(element.x);
    const y = Math.trunc(element.y);
    const size = Math.trunc(element.size);
    target.ellipse({ x: x - Math.floor(size / 2), y: y - size, width: size, height: Math.trunc(size * 1.3), color: element.color });
    target.ellipse({
      x: x - Math.floor(size / 4),
      y: y - size + 5,
      width: Math.floor(size / 3),
      height: Math.floor(size / 3),
      color: brighten(element.color, 80),
    });
    target.line({ from: [x, y + Math.trunc(size * 0.3)], to: [x, y + size], color: STRING_COLOR, width: 1 });
  }

  private drawConfetti(target: DrawTarget, element: ParadeElement) {
    const size = Math.trunc(element.size);
    const cos = Math.cos(element.rotation);
    const sin = Math.sin(element.rotation);
    const corners: Point[] = [
      [-1, -0.5],
      [1, -0.5],
      [1, 0.5],
      [-1, 0.5],
    ];
    const points = corners.map(([dx, dy]): Point => [
      Math.trunc(element.x) + dx * size * cos - dy * size * sin,
      Math.trunc(element.y) + dx * size * sin + dy * size * cos,
    ]);
    target.polygon({ points, color: element.color });
  }

  private drawStar(target: DrawTarget, element: ParadeElement) {
    const twinkle = (Math.sin(this.elapsed * 8 + element.x + element.y) + 1) / 2;
    if (twinkle < 0.3) return;
    const x = Math.trunc(element.x);
    const y = Math.trunc(element.y);
    const size = Math.trunc(element.size);
    const half = Math.floor(size / 2);
    const color = scaleColor(element.color, twinkle);
    target.line({ from: [x - size, y], to: [x + size, y], color, width: 2 });
    target.line({ from: [x, y - size], to: [x, y + size], color, width: 2 });
    target.line({ from: [x - half, y - half], to: [x + half, y + half], color, width: 1 });
    target.line({ from: [x - half, y + half], to: [x + half, y - half], color, width: 1 });
  }

  private drawBanner(target: DrawTarget) {
    const offset = this.bannerOffset;
    for (let i = 0; i < BANNER_SPARKLES; i += 1) {
      const intensity = (Math.sin(this.elapsed * 6 + i * 0.5) + 1) / 2;
      if (intensity <= 0.5) continue;
      target.circle({
        x: Math.trunc(((i * this.width) / BANNER_SPARKLES + offset) % this.width),
        y: Math.trunc(BANNER_HEIGHT / 2 + Math.sin(this.elapsed * 4 + i) * 10),
        radius: Math.trunc(3 + intensity * 3),
        color: scaleColor(SPARKLE_COLOR, intensity),
      });
    }
  }
}
