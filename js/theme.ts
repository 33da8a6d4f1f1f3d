/**
 * Notebook theme detection and the colours figure chrome draws with.
 * The figure body keeps its own colour; menus, dialogs and readouts follow
 * the notebook theme.
 */

import { useState, useEffect } from "react";
import type { Rgb } from "./figure-layout";

// ============================================================================
// Types
// ============================================================================
export type Theme = "light" | "dark";

export interface ThemeColors {
  bg: string;
  text: string;
  textMuted: string;
  border: string;
  controlBg: string;
  accent: string;
}

// ============================================================================
// Color palettes
// ============================================================================
export const DARK_COLORS: ThemeColors = {
  bg: "#1e1e1e",
  text: "#e0e0e0",
  textMuted: "#888",
  border: "#3a3a3a",
  controlBg: "#252525",
  accent: "#5af",
};

export const LIGHT_COLORS: ThemeColors = {
  bg: "#ffffff",
  text: "#1e1e1e",
  textMuted: "#666",
  border: "#ccc",
  controlBg: "#f0f0f0",
  accent: "#0066cc",
};

export function getThemeColors(theme: Theme): ThemeColors {
  return theme === "dark" ? DARK_COLORS : LIGHT_COLORS;
}

/** CSS colour for an RGB triple of fractions, e.g. [0, 0.5, 1] -> "rgb(0, 128, 255)". */
export function rgbToCss(rgb: Rgb): string {
  const [r, g, b] = rgb.map((v) => Math.round(Math.min(Math.max(v, 0), 1) * 255));
  return `rgb(${r}, ${g}, ${b})`;
}

// ============================================================================
// Theme detection
// ============================================================================
export function detectTheme(): Theme {
  // JupyterLab
  const jpThemeLight = document.body.dataset.jpThemeLight;
  if (jpThemeLight !== undefined) return jpThemeLight === "true" ? "light" : "dark";

  // VS Code
  const classes = `${document.body.className} ${document.documentElement.className}`;
  if (classes.includes("vscode-")) return classes.includes("vscode-dark") ? "dark" : "light";

  const prefersDark = window.matchMedia?.("(prefers-color-scheme: dark)")?.matches;
  return prefersDark ? "dark" : "light";
}

// ============================================================================
// React hook
// ============================================================================
export function useTheme(): { theme: Theme; colors: ThemeColors } {
  const [theme, setTheme] = useState<Theme>(() => detectTheme());

  useEffect(() => {
    const mediaQuery = window.matchMedia?.("(prefers-color-scheme: dark)");
    const handleChange = () => setTheme(detectTheme());
    mediaQuery?.addEventListener?.("change", handleChange);

    const observer = new MutationObserver(() => setTheme(detectTheme()));
    observer.observe(document.body, { attributes: true, attributeFilter: ["data-jp-theme-light", "class"] });

    return () => {
      mediaQuery?.removeEventListener?.("change", handleChange);
      observer.disconnect();
    };
  }, []);

  return { theme, colors: getThemeColors(theme) };
}
