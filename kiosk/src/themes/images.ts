import fs from "node:fs";
import path from "node:path";
import { logger } from "../utils/logger";
import rideImageData from "./data/rideImages.json";
import { isNonEmptyString, matchPattern, toPatternTable, type PatternTable } from "./themes";

export const GENERIC_FOLDER = "generic";
const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);
const PARK_IMAGE_EXTENSIONS = [".png", ".jpg"];

const toUrlPath = (...segments: string[]) => `/assets/${segments.map(encodeURIComponent).join("/")}`;

/**
 * Resolves ride and park artwork under `<assetsDir>/images`. Each folder keeps
 * a cycle position so a ride shows a different picture on every lap of the
 * rotation. Returned paths are URL paths served under /assets.
 */
export class ImageLibrary {
  private readonly imagesDir: string;
  private readonly rideFolders: PatternTable<string>;
  private readonly folderImages = new Map<string, string[]>();
  private readonly cycleIndex = new Map<string, number>();

  constructor(assetsDir: string, rideImages: unknown = rideImageData) {
    this.imagesDir = path.join(assetsDir, "images");
    this.rideFolders = toPatternTable(rideImages, isNonEmptyString, "rideImages");
  }

  folderForRide(rideName: string): string {
    return matchPattern(this.rideFolders, rideName) ?? GENERIC_FOLDER;
  }

  private loadFolder(folder: string): string[] {
    const cached = this.folderImages.get(folder);
    if (cached) return cached;

    const folderPath = path.join(this.imagesDir, folder);
    let files: string[] = [];
    try {
      files = fs
        .readdirSync(folderPath)
        .filter((file) => IMAGE_EXTENSIONS.has(path.extname(file).toLowerCase()))
        .sort();
      if (files.length > 0) logger.info("Loaded ride images", { folder, count: files.length });
    } catch {
      logger.debug("Image folder not found", { folder });
    }
    this.folderImages.set(folder, files);
    this.cycleIndex.set(folder, 0);
    return files;
  }

  /** Current image for the ride, or null when its folder has none (themed placeholder). */
  imageForRide(rideName: string): string | null {
    const folder = this.folderForRide(rideName);
    const files = this.loadFolder(folder);
    const file = files[this.cycleIndex.get(folder) ?? 0];
    return file ? toUrlPath("images", folder, file) : null;
  }

  /** Moves every loaded folder to its next image; called once per full rotation. */
  advanceAllCycles() {
    for (const [folder, index] of this.cycleIndex) {
      const count = this.folderImages.get(folder)?.length ?? 0;
      if (count > 0) this.cycleIndex.set(folder, (index + 1) % count);
    }
  }

  cyclePosition(folder: string): number {
    return this.cycleIndex.get(folder) ?? 0;
  }

  parkImage(parkSlug: string): string | null {
    for (const extension of PARK_IMAGE_EXTENSIONS) {
      const file = `${parkSlug}${extension}`;
      if (fs.existsSync(path.join(this.imagesDir, "parks", file))) {
        return toUrlPath("images", "parks", file);
      }
    }
    return null;
  }

  preloadAll() {
    const folders = new Set([...this.rideFolders.map(([, folder]) => folder), GENERIC_FOLDER]);
    folders.forEach((folder) => this.loadFolder(folder));
  }
}
