import { displayWait, waitCategory, type ClosedPark, type Ride } from "@parkboard/core";
import type { DisplayItem } from "../models/waitTimes";
import { STATUS_COLORS, WAIT_COLORS, blendColors, colorScheme, type ColorScheme, type ThemeName } from "../themes/colors";
import type { ImageLibrary } from "../themes/images";
import type { ThemeCatalog } from "../themes/themes";
import { tempDisplay, weatherGlyph, type WeatherSnapshot } from "../weather/client";
import { toErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { Freshness } from "./freshness";
import { SceneBuilder, type Surface } from "./scene";

const BOX_MARGIN = 30;
const BAR_OPACITY = 200 / 255;
const GRADIENT_BANDS = 24;
const BADGE_WIDTH = 60;
const BADGE_HEIGHT = 30;
const SMALL_TEXT = 24;
const AVERAGE_GLYPH_WIDTH = 0.55;

export interface CardOverlay {
  freshness: Freshness;
  weather: WeatherSnapshot | null;
}

/** Shortens text whose estimated rendered width exceeds maxWidth, keeping at least ten characters. */
export const truncateToWidth = (text: string, fontSize: number, maxWidth: number) => {
  const estimate = (value: string) => value.length * fontSize * AVERAGE_GLYPH_WIDTH;
  let truncated = text;
  while (estimate(truncated) > maxWidth && truncated.length > 10) {
    truncated = `${truncated.slice(0, -4)}...`;
  }
  return truncated;
};

export class CardRenderer {
  readonly width: number;
  readonly height: number;
  private readonly themes: ThemeCatalog;
  private readonly images: ImageLibrary;

  constructor(width: number, height: number, themes: ThemeCatalog, images: ImageLibrary) {
    this.width = width;
    this.height = height;
    this.themes = themes;
    this.images = images;
  }

  private drawGradient(scene: SceneBuilder, colors: ColorScheme) {
    const bandHeight = this.height / GRADIENT_BANDS;
    for (let band = 0; band < GRADIENT_BANDS; band += 1) {
      const ratio = band / GRADIENT_BANDS;
      scene.rect({
        x: 0,
        y: Math.floor(band * bandHeight),
        width: this.width,
        height: Math.ceil(bandHeight),
        color: blendColors(colors.background, colors.accent, ratio * 0.3),
      });
    }
  }

  private drawBackground(scene: SceneBuilder, image: string | null, colors: ColorScheme) {
    if (image) {
      scene.image({ x: 0, y: 0, width: this.width, height: this.height, src: image });
      return;
    }
    this.drawGradient(scene, colors);
  }

  private drawBar(scene: SceneBuilder, colors: ColorScheme, barHeight: number) {
    const barY = this.height - barHeight - 10;
    scene.rect({ x: 0, y: barY, width: this.width, height: barHeight, color: colors.background, alpha: BAR_OPACITY });
    scene.line({ from: [0, barY], to: [this.width, barY], color: colors.accent, width: 3 });
    return barY;
  }

  private drawOverlay(scene: SceneBuilder, overlay: CardOverlay, colors: ColorScheme) {
    const { badge } = overlay.freshness;
    if (badge) {
      const centerX = this.width - BOX_MARGIN - 15;
      const centerY = BOX_MARGIN + 15;
      scene.rect({
        x: centerX - BADGE_WIDTH / 2,
        y: centerY - BADGE_HEIGHT / 2,
        width: BADGE_WIDTH,
        height: BADGE_HEIGHT,
        color: STATUS_COLORS[badge.tone],
        alpha: BAR_OPACITY,
        radius: 8,
      });
      scene.text({
        x: centerX,
        y: centerY,
        text: badge.label,
        color: [0, 0, 0],
        font: this.themes.font("classic", SMALL_TEXT),
        align: "center",
      });
    }

    if (overlay.weather) {
      scene.text({
        x: BOX_MARGIN,
        y: BOX_MARGIN + 15,
        text: `${weatherGlyph(overlay.weather.iconCode)} ${tempDisplay(overlay.weather)}`,
        color: colors.textPrimary,
        font: this.themes.font("classic", SMALL_TEXT),
        align: "left",
      });
    }
  }

  renderRide(ride: Ride, overlay: CardOverlay): Surface {
    const theme = this.themes.themeForRide(ride.name);
    const colors = colorScheme(theme);
    const scene = new SceneBuilder(this.width, this.height);

    this.drawBackground(scene, this.images.imageForRide(ride.name), colors);
    const barY = this.drawBar(scene, colors, 130);
    const centerX = this.width / 2;

    scene.text({
      x: centerX,
      y: barY + 10,
      text: displayWait(ride),
      color: WAIT_COLORS[waitCategory(ride.waitTime)],
      font: this.themes.font(theme, 80),
      align: "center",
    });
    scene.text({
      x: centerX,
      y: barY + 90,
      text: truncateToWidth(ride.name, 36, this.width - 40),
      color: colors.textPrimary,
      font: this.themes.font(theme, 36),
      align: "center",
    });

    this.drawOverlay(scene, overlay, colors);
    return scene.build();
  }

  renderClosedPark(park: ClosedPark, overlay: CardOverlay): Surface {
    const theme: ThemeName = "classic";
    const colors = colorScheme(theme);
    const scene = new SceneBuilder(this.width, this.height);

    this.drawBackground(scene, this.images.parkImage(park.slug), colors);
    const barY = this.drawBar(scene, colors, 140);
    const centerX = this.width / 2;

    scene.text({
      x: centerX,
      y: barY + 10,
      text: "CLOSED",
      color: STATUS_COLORS.closed,
      font: this.themes.font(theme, 80),
      align: "center",
    });
    scene.text({
      x: centerX,
      y: barY + 85,
      text: park.name,
      color: colors.textPrimary,
      font: this.themes.font(theme, 36),
      align: "center",
    });
    if (park.opensAt) {
      scene.text({
        x: centerX,
        y: barY + 115,
        text: `Opens at ${park.opensAt}`,
        color: colors.accent,
        font: this.themes.font(theme, 28),
        align: "center",
      });
    }

    this.drawOverlay(scene, overlay, colors);
    return scene.build();
  }

  renderItem(item: DisplayItem, overlay: CardOverlay): Surface {
    switch (item.kind) {
      case "ride":
        return this.renderRide(item.ride, overlay);
      case "closed_park":
        return this.renderClosedPark(item.park, overlay);
    }
  }

  renderNoData(overlay: CardOverlay): Surface {
    const colors = colorScheme("classic");
    const scene = new SceneBuilder(this.width, this.height);
    const centerX = this.width / 2;
    const centerY = this.height / 2;

    this.drawGradient(scene, colors);
    scene.text({
      x: centerX,
      y: centerY,
      text: "No rides currently reporting wait times",
      color: colors.textSecondary,
      font: this.themes.font("fantasy", 38),
      align: "center",
    });
    scene.text({
      x: centerX,
      y: centerY + 50,
      text: "Parks may be closed",
      color: colors.accent,
      font: this.themes.font("classic", 26),
      align: "center",
    });
    const { ageMinutes } = overlay.freshness;
    if (ageMinutes !== null && ageMinutes >= 0) {
      scene.text({
        x: centerX,
        y: centerY + 100,
        text: `Last updated: ${ageMinutes} minutes ago`,
        color: colors.textSecondary,
        font: this.themes.font("classic", SMALL_TEXT),
        align: "center",
      });
    }
    this.drawOverlay(scene, overlay, colors);
    return scene.build();
  }

  renderError(message: string): Surface {
    const scene = new SceneBuilder(this.width, this.height);
    scene.rect({ x: 0, y: 0, width: this.width, height: this.height, color: [30, 0, 0] });
    scene.text({
      x: this.width / 2,
      y: this.height / 2 - 30,
      text: "Display Error",
      color: STATUS_COLORS.error,
      font: this.themes.font("classic", 36),
      align: "center",
    });
    scene.text({
      x: this.width / 2,
      y: this.height / 2 + 20,
      text: message.slice(0, 50),
      color: [200, 200, 200],
      font: this.themes.font("classic", SMALL_TEXT),
      align: "center",
    });
    return scene.build();
  }

  /** Renders a card; any failure yields the error placeholder instead. */
  renderSafely(render: () => Surface): Surface {
    try {
      return render();
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error("Card render failed", { message });
      return this.renderError(message);
    }
  }
}
