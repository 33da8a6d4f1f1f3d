import { describe, it, expect, afterEach } from "vitest";
import { DARK_COLORS, LIGHT_COLORS, detectTheme, getThemeColors, rgbToCss } from "../js/theme";

describe("theme", () => {
  afterEach(() => {
    delete document.body.dataset.jpThemeLight;
    document.body.className = "";
  });

  it("converts RGB fractions to CSS", () => {
    expect(rgbToCss([0, 0.5, 1])).toBe("rgb(0, 128, 255)");
    expect(rgbToCss([-1, 2, 0.2])).toBe("rgb(0, 255, 51)");
  });

  it("follows the JupyterLab theme attribute", () => {
    document.body.dataset.jpThemeLight = "false";
    expect(detectTheme()).toBe("dark");
    document.body.dataset.jpThemeLight = "true";
    expect(detectTheme()).toBe("light");
  });

  it("follows VS Code body classes", () => {
    document.body.className = "vscode-body vscode-dark";
    expect(detectTheme()).toBe("dark");
  });

  it("falls back to the OS preference", () => {
    expect(detectTheme()).toBe("light");
    expect(getThemeColors("dark")).toBe(DARK_COLORS);
    expect(getThemeColors("light")).toBe(LIGHT_COLORS);
  });
});
