import type { ApplicationState, Figure } from "./figure-data";

export type ImageTool = (state: ApplicationState, figure: Figure) => void | Promise<void>;

/**
 * Tool names to list in the image tools menu. The application's list starts
 * with a heading entry, which is skipped.
 */
export function imageToolNames(filenames: readonly string[]): string[] {
  return filenames
    .slice(1)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export class ImageToolRegistry {
  private readonly tools = new Map<string, ImageTool>();

  register(name: string, tool: ImageTool): this {
    const key = name.trim();
    if (!key) throw new Error("Image tool name must not be empty.");
    this.tools.set(key, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name.trim());
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  async invoke(name: string, state: ApplicationState, figure: Figure): Promise<void> {
    const tool = this.tools.get(name.trim());
    if (!tool) {
      const registered = this.names().join(", ") || "none";
      throw new Error(`Unknown image tool '${name}'. Registered tools: ${registered}.`);
    }
    await tool(state, figure);
  }
}
