import type { Universe } from "@lifegrid/universe";

export interface TextGlyphs {
  alive: string;
  dead: string;
}

export const DEFAULT_GLYPHS: TextGlyphs = {
  alive: "◼",
  dead: "◻"
};

export function renderText(universe: Universe, glyphs: TextGlyphs = DEFAULT_GLYPHS): string {
  const lines: string[] = [];
  for (let row = 0; row < universe.height(); row += 1) {
    let line = "";
    for (let col = 0; col < universe.width(); col += 1) {
      line += universe.isAlive(row, col) ? glyphs.alive : glyphs.dead;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
