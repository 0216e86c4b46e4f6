import type { DrawTarget, Rgb } from "../display/scene";
import { scaleColor } from "../themes/colors";
import type { AnimationDriver } from "./drivers";
import { pick, randomInt, uniform, type RandomSource } from "./random";

const COLORS: readonly [Rgb, ...Rgb[]] = [
  [255, 215, 0],
  [255, 105, 180],
  [0, 255, 255],
  [255, 69, 0],
  [50, 205, 50],
  [255, 255, 255],
  [147, 112, 219],
  [255, 165, 0],
];

const GRAVITY = 0.15;
const INITIAL_LAUNCH_INTERVAL = 0.3;
/** Velocities are tuned in pixels per 60 Hz frame. */
const FRAME_SCALE = 60;

export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  color: Rgb;
  life: number;
  size: number;
  decay: number;
}

export interface Rocket {
  x: number;
  y: number;
  targetY: number;
  vy: number;
  color: Rgb;
  exploded: boolean;
  particles: Particle[];
}

const clampChannel = (value: number) => Math.max(0, Math.min(255, value));

export class FireworksDriver implements AnimationDriver {
  private readonly width: number;
  private readonly height: number;
  private readonly random: RandomSource;
  private rocketList: Rocket[] = [];
  private lastLaunch = 0;
  private launchInterval = INITIAL_LAUNCH_INTERVAL;

  constructor(width: number, height: number, random: RandomSource = Math.random) {
    this.width = width;
    this.height = height;
    this.random = random;
  }

  get rockets(): readonly Rocket[] {
    return this.rocketList;
  }

  get nextLaunchInterval() {
    return this.launchInterval;
  }

  reset() {
    this.rocketList = [];
    this.lastLaunch = 0;
    this.launchInterval = INITIAL_LAUNCH_INTERVAL;
  }

  update(dt: number, elapsed: number) {
    if (elapsed - this.lastLaunch > this.launchInterval) {
      this.launch();
      this.lastLaunch = elapsed;
      this.launchInterval = uniform(this.random, 0.2, 0.6);
    }

    const step = dt * FRAME_SCALE;
    for (const rocket of this.rocketList) {
      if (!rocket.exploded) {
        rocket.y += rocket.vy * step;
        rocket.vy += GRAVITY * 0.3 * step;
        if (rocket.y <= rocket.targetY || rocket.vy >= 0) this.explode(rocket);
        continue;
      }
      for (const particle of rocket.particles) {
        particle.x += particle.vx * step;
        particle.y += particle.vy * step;
        particle.vy += GRAVITY * step;
        particle.life -= particle.decay * step;
      }
      rocket.particles = rocket.particles.filter((particle) => particle.life > 0);
    }
    this.rocketList = this.rocketList.filter((rocket) => !rocket.exploded || rocket.particles.length > 0);
  }

  private launch() {
    this.rocketList.push({
      x: randomInt(this.random, Math.trunc(this.width * 0.1), Math.trunc(this.width * 0.9)),
      y: this.height + 10,
      targetY: randomInt(this.random, Math.trunc(this.height * 0.15), Math.trunc(this.height * 0.4)),
      vy: -uniform(this.random, 12, 16),
      color: pick(this.random, COLORS),
      exploded: false,
      particles: [],
    });
  }

  private explode(rocket: Rocket) {
    rocket.exploded = true;
    const count = randomInt(this.random, 60, 100);
    for (let i = 0; i < count; i += 1) {
      const angle = uniform(this.random, 0, Math.PI * 2);
      const speed = uniform(this.random, 2, 8);
      const color: Rgb = [
        clampChannel(rocket.color[0] + randomInt(this.random, -30, 30)),
        clampChannel(rocket.color[1] + randomInt(this.random, -30, 30)),
        clampChannel(rocket.color[2] + randomInt(this.random, -30, 30)),
      ];
      rocket.particles.push({
        x: rocket.x,
        y: rocket.y,
        vx: Math.cos(angle) * speed,
        vy: Math.sin(angle) * speed,
        color,
        life: 1,
        size: uniform(this.random, 2, 4),
        decay: uniform(this.random, 0.01, 0.025),
      });
    }
  }

  render(target: DrawTarget) {
    for (const rocket of this.rocketList) {
      if (!rocket.exploded) {
        const x = Math.trunc(rocket.x);
        const y = Math.trunc(rocket.y);
        target.circle({ x, y, radius: 3, color: rocket.color });
        target.circle({ x, y: y + 5, radius: 2, color: scaleColor(rocket.color, 0.5) });
        continue;
      }
      for (const particle of rocket.particles) {
        const size = Math.trunc(particle.size * particle.life);
        if (size <= 0) continue;
        target.circle({
          x: Math.trunc(particle.x),
          y: Math.trunc(particle.y),
          radius: Math.max(1, size),
          color: scaleColor(particle.color, particle.life),
        });
      }
    }
  }
}
