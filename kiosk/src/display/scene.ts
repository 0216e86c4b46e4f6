export type Rgb = readonly [number, number, number];

export type Point = readonly [number, number];

export type TextAlign = "left" | "center" | "right";

export interface FontSpec {
  family: string;
  /** Font file under the assets directory, when the family ships one. */
  file: string | null;
  size: number;
}

/** Opacity is 0-1 and defaults to opaque. */
export type DrawCommand =
  | { op: "rect"; x: number; y: number; width: number; height: number; color: Rgb; alpha?: number; radius?: number }
  | { op: "circle"; x: number; y: number; radius: number; color: Rgb; alpha?: number }
  | { op: "line"; from: Point; to: Point; color: Rgb; width: number; alpha?: number }
  | { op: "ellipse"; x: number; y: number; width: number; height: number; color: Rgb; alpha?: number }
  | { op: "polygon"; points: Point[]; color: Rgb; alpha?: number }
  | { op: "text"; x: number; y: number; text: string; color: Rgb; font: FontSpec; align: TextAlign }
  | { op: "image"; x: number; y: number; width: number; height: number; src: string };

export interface Surface {
  readonly width: number;
  readonly height: number;
  readonly commands: readonly DrawCommand[];
}

type CommandOf<Op extends DrawCommand["op"]> = Omit<Extract<DrawCommand, { op: Op }>, "op">;

/** What animation drivers and card renderers draw onto. */
export interface DrawTarget {
  readonly width: number;
  readonly height: number;
  rect(command: CommandOf<"rect">): void;
  circle(command: CommandOf<"circle">): void;
  line(command: CommandOf<"line">): void;
  ellipse(command: CommandOf<"ellipse">): void;
  polygon(command: CommandOf<"polygon">): void;
  text(command: CommandOf<"text">): void;
  image(command: CommandOf<"image">): void;
}

export class SceneBuilder implements DrawTarget {
  readonly width: number;
  readonly height: number;
  private readonly commands: DrawCommand[] = [];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  rect(command: CommandOf<"rect">) {
    this.commands.push({ op: "rect", ...command });
  }

  circle(command: CommandOf<"circle">) {
    this.commands.push({ op: "circle", ...command });
  }

  line(command: CommandOf<"line">) {
    this.commands.push({ op: "line", ...command });
  }

  ellipse(command: CommandOf<"ellipse">) {
    this.commands.push({ op: "ellipse", ...command });
  }

  polygon(command: CommandOf<"polygon">) {
    this.commands.push({ op: "polygon", ...command });
  }

  text(command: CommandOf<"text">) {
    this.commands.push({ op: "text", ...command });
  }

  image(command: CommandOf<"image">) {
    this.commands.push({ op: "image", ...command });
  }

  get size() {
    return this.commands.length;
  }

  build(): Surface {
    return Object.freeze({ width: this.width, height: this.height, commands: Object.freeze([...this.commands]) });
  }
}

export const emptySurface = (width: number, height: number): Surface => new SceneBuilder(width, height).build();
