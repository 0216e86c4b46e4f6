import type { DisplayPhase } from "@parkboard/core";
import type { ScheduledEvent } from "../events/scheduler";
import type { CardRenderer } from "./cardRenderer";
import type { RenderItem, RotationController } from "./rotation";
import { SceneBuilder, type Surface } from "./scene";
import { getTransition, type Layer } from "./transitions";

export interface Frame {
  sequence: number;
  width: number;
  height: number;
  phase: DisplayPhase;
  generatedAt: string;
  /** Drawn bottom to top. */
  layers: Layer[];
}

const EVENT_TITLES: Record<ScheduledEvent["kind"], string> = {
  fireworks: "Fireworks",
  parade: "Parade",
};

const fullLayer = (surface: Surface): Layer => ({ surface, offsetX: 0, offsetY: 0, opacity: 1 });

export class FrameComposer {
  private readonly rotation: RotationController;
  private readonly cards: CardRenderer;
  private sequence = 0;
  private latest: Frame | null = null;

  constructor(rotation: RotationController, cards: CardRenderer) {
    this.rotation = rotation;
    this.cards = cards;
  }

  get latestFrame() {
    return this.latest;
  }

  private layersFor(item: RenderItem): Layer[] {
    const { width, height } = this.cards;
    switch (item.kind) {
      case "card": {
        const overlay = this.rotation.overlay();
        return [fullLayer(this.cards.renderSafely(() => this.cards.renderItem(item.item, overlay)))];
      }
      case "transition":
        return getTransition(item.transition)(item.previous, item.next, item.alpha, width);
      case "empty": {
        const overlay = this.rotation.overlay();
        return [fullLayer(this.cards.renderSafely(() => this.cards.renderNoData(overlay)))];
      }
      case "event": {
        const scene = new SceneBuilder(width, height);
        scene.rect({ x: 0, y: 0, width, height, color: [0, 0, 0] });
        item.driver.render(scene);
        scene.text({
          x: width / 2,
          y: height - 40,
          text: `${EVENT_TITLES[item.event.kind]} at ${item.event.parkName}`,
          color: [255, 255, 255],
          font: { family: "sans-serif", file: null, size: 28 },
          align: "center",
        });
        return [fullLayer(scene.build())];
      }
    }
  }

  compose(now: Date = new Date()): Frame {
    this.sequence += 1;
    const frame: Frame = {
      sequence: this.sequence,
      width: this.cards.width,
      height: this.cards.height,
      phase: this.rotation.phase,
      generatedAt: now.toISOString(),
      layers: this.layersFor(this.rotation.currentRenderItem()),
    };
    this.latest = frame;
    return frame;
  }
}
