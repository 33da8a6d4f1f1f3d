/**
 * Figure - figure window for image analysis results.
 *
 * Features:
 * - Menu bar with Interactive Zoom and the application's image tools
 * - R/G/B checkboxes that hide and restore colour channels of RGB images
 * - Figure toolbar with export (PNG, or ZIP for several images) and zoom reset
 * - Pixel readout under the cursor
 */

import * as React from "react";
import { createRender, useModel, useModelState } from "@anywidget/react";
import Box from "@mui/material/Box";
import Typography from "@mui/material/Typography";
import Stack from "@mui/material/Stack";
import Button from "@mui/material/Button";
import Menu from "@mui/material/Menu";
import MenuItem from "@mui/material/MenuItem";
import Checkbox from "@mui/material/Checkbox";
import Dialog from "@mui/material/Dialog";
import DialogTitle from "@mui/material/DialogTitle";
import DialogContent from "@mui/material/DialogContent";
import DialogActions from "@mui/material/DialogActions";
import ZoomInIcon from "@mui/icons-material/ZoomIn";
import BuildIcon from "@mui/icons-material/Build";

import { toggleChannel } from "../channels";
import { exportFigure } from "../export";
import { dispatchMenuAction, openFigure, FigureRegistry } from "../figure-registry";
import type { DispatchEnv, InteractiveZoomLoader } from "../figure-registry";
import type { ApplicationState, ChannelControl, Figure, FigureImage, FigureMenu, MenuAction } from "../figure-data";
import { getMessage } from "../figure-layout";
import type { ChannelTag } from "../figure-layout";
import { extractFloat32, splitFrames } from "../format";
import { ImageToolRegistry } from "../image-tools";
import {
  DEFAULT_ZOOM_STATE,
  getZoomState,
  isZoomed,
  panBy,
  resetZoom,
  setZoomState,
  toImageCoords,
  zoomAt,
} from "../interactive-zoom";
import type { ZoomState } from "../interactive-zoom";
import { formatPixel, imageToRgba, pixelAt } from "../render";
import { rgbToCss, useTheme } from "../theme";

// ============================================================================
// Constants
// ============================================================================
const SINGLE_IMAGE_TARGET = 400;
const GALLERY_IMAGE_TARGET = 300;
const MAX_COLUMNS = 3;

const typography = {
  label: { fontSize: 11 },
  value: { fontSize: 10, fontFamily: "monospace" },
};
const compactButton = {
  fontSize: 10,
  py: 0.25,
  px: 1,
  minWidth: 0,
  "&.Mui-disabled": {
    color: "#666",
    borderColor: "#444",
  },
};

// ============================================================================
// Registry subscription
// ============================================================================
function useFigure(registry: FigureRegistry, number: number | null): { figure: Figure | undefined; version: number } {
  const [version, setVersion] = React.useState(0);
  React.useEffect(() => registry.subscribe(() => setVersion((v) => v + 1)), [registry]);
  return { figure: number === null ? undefined : registry.get(number), version };
}

// ============================================================================
// Image canvas
// ============================================================================
interface FigureCanvasProps {
  image: FigureImage;
  version: number;
  displaySize: number;
  zoomState: ZoomState;
  interactive: boolean;
  onZoomChange: (state: ZoomState) => void;
  onHover: (readout: string | null) => void;
  registerCanvas: (canvas: HTMLCanvasElement | null) => void;
}

function FigureCanvas({ image, version, displaySize, zoomState, interactive, onZoomChange, onHover, registerCanvas }: FigureCanvasProps) {
  const canvasRef = React.useRef<HTMLCanvasElement | null>(null);
  const [panStart, setPanStart] = React.useState<{ x: number; y: number; start: ZoomState } | null>(null);

  const displayScale = displaySize / Math.max(image.width, image.height);
  const canvasW = Math.max(1, Math.round(image.width * displayScale));
  const canvasH = Math.max(1, Math.round(image.height * displayScale));

  const setCanvas = React.useCallback((canvas: HTMLCanvasElement | null) => {
    canvasRef.current = canvas;
    registerCanvas(canvas);
  }, [registerCanvas]);

  React.useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext("2d");
    if (!ctx) return;
    const offscreen = document.createElement("canvas");
    offscreen.width = image.width;
    offscreen.height = image.height;
    const offCtx = offscreen.getContext("2d");
    if (!offCtx) return;
    const imageData = offCtx.createImageData(image.width, image.height);
    imageData.data.set(imageToRgba(image));
    offCtx.putImageData(imageData, 0, 0);

    ctx.imageSmoothingEnabled = false;
    ctx.clearRect(0, 0, canvas.width, canvas.height);
    ctx.save();
    ctx.translate(zoomState.panX, zoomState.panY);
    ctx.scale(zoomState.zoom, zoomState.zoom);
    ctx.drawImage(offscreen, 0, 0, canvas.width, canvas.height);
    ctx.restore();
  }, [image, version, zoomState, canvasW, canvasH]);

  // Scroll zoom needs a non-passive listener to keep the page from scrolling
  React.useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas || !interactive) return;
    const handleWheel = (e: WheelEvent) => {
      e.preventDefault();
      const rect = canvas.getBoundingClientRect();
      if (rect.width === 0 || rect.height === 0) return;
      const mouseX = (e.clientX - rect.left) * (canvas.width / rect.width);
      const mouseY = (e.clientY - rect.top) * (canvas.height / rect.height);
      onZoomChange(zoomAt(zoomState, mouseX, mouseY, e.deltaY));
    };
    canvas.addEventListener("wheel", handleWheel, { passive: false });
    return () => canvas.removeEventListener("wheel", handleWheel);
  }, [interactive, zoomState, onZoomChange]);

  const toCanvas = (e: React.MouseEvent<HTMLCanvasElement>): { x: number; y: number } | null => {
    const canvas = e.currentTarget;
    const rect = canvas.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return null;
    return {
      x: (e.clientX - rect.left) * (canvas.width / rect.width),
      y: (e.clientY - rect.top) * (canvas.height / rect.height),
    };
  };

  const handleMouseDown = (e: React.MouseEvent<HTMLCanvasElement>) => {
    if (!interactive) return;
    setPanStart({ x: e.clientX, y: e.clientY, start: zoomState });
  };

  const handleMouseMove = (e: React.MouseEvent<HTMLCanvasElement>) => {
    const point = toCanvas(e);
    if (!point) return;
    if (panStart) {
      const rect = e.currentTarget.getBoundingClientRect();
      const dx = (e.clientX - panStart.x) * (e.currentTarget.width / rect.width);
      const dy = (e.clientY - panStart.y) * (e.currentTarget.height / rect.height);
      onZoomChange(panBy(panStart.start, dx, dy));
      return;
    }
    const { x, y } = toImageCoords(zoomState, point.x, point.y, displayScale);
    const values = pixelAt(image, x, y);
    onHover(values ? formatPixel(x, y, values) : null);
  };

  const handleMouseUp = () => setPanStart(null);

  return (
    <canvas
      ref={setCanvas}
      width={canvasW}
      height={canvasH}
      data-testid={`canvas-${image.id}`}
      style={{ width: canvasW, height: canvasH, cursor: interactive ? "grab" : "crosshair", imageRendering: "pixelated" }}
      onMouseDown={handleMouseDown}
      onMouseMove={handleMouseMove}
      onMouseUp={handleMouseUp}
      onMouseLeave={() => { handleMouseUp(); onHover(null); }}
      onDoubleClick={() => { if (interactive) onZoomChange(DEFAULT_ZOOM_STATE); }}
    />
  );
}

// ============================================================================
// Channel checkbox
// ============================================================================
function ChannelCheckbox({ control, onToggle }: { control: ChannelControl; onToggle: (tag: ChannelTag, checked: boolean) => void }) {
  const [x, y, w, h] = control.position;
  return (
    <Box
      data-testid={`channel-${control.label}`}
      sx={{
        position: "absolute",
        left: `${x * 100}%`,
        bottom: `${y * 100}%`,
        minWidth: `${w * 100}%`,
        minHeight: `${h * 100}%`,
        display: "flex",
        alignItems: "center",
        bgcolor: rgbToCss(control.backgroundColor),
        pr: 0.5,
      }}
    >
      <Checkbox
        size="small"
        checked={control.value === control.max}
        onChange={(e) => onToggle(control.tag, e.target.checked)}
        inputProps={{ "aria-label": control.label }}
        sx={{ p: 0.25 }}
      />
      <Typography sx={{ fontSize: control.fontSize, color: "#000" }}>{control.label}</Typography>
    </Box>
  );
}

// ============================================================================
// Figure window
// ============================================================================
export interface FigureWindowProps {
  registry: FigureRegistry;
  figureNumber: number | null;
  tools?: ImageToolRegistry;
  forwardTool?: (name: string) => void;
  loadInteractiveZoom?: InteractiveZoomLoader;
  imageSize?: number;
}

export function FigureWindow({ registry, figureNumber, tools, forwardTool, loadInteractiveZoom, imageSize }: FigureWindowProps) {
  const { colors: themeColors } = useTheme();
  const { figure, version } = useFigure(registry, figureNumber);
  const [openMenu, setOpenMenu] = React.useState<{ label: string; anchor: HTMLElement } | null>(null);
  const [message, setMessage] = React.useState<string | null>(null);
  const [readout, setReadout] = React.useState<string | null>(null);
  const canvasRefs = React.useRef<(HTMLCanvasElement | null)[]>([]);
  const defaultTools = React.useMemo(() => new ImageToolRegistry(), []);

  const env = React.useMemo<DispatchEnv>(() => ({
    tools: tools ?? defaultTools,
    showMessage: setMessage,
    loadInteractiveZoom,
    forwardTool,
  }), [tools, defaultTools, loadInteractiveZoom, forwardTool]);

  const runAction = React.useCallback((action: MenuAction) => {
    if (!figure) return;
    setOpenMenu(null);
    dispatchMenuAction(registry, figure, action, env).catch((e: unknown) => {
      setMessage(e instanceof Error ? e.message : String(e));
    });
  }, [registry, figure, env]);

  const handleToggle = React.useCallback((tag: ChannelTag, checked: boolean) => {
    if (figureNumber === null) return;
    registry.update(figureNumber, (f) => toggleChannel(f, tag, checked ? 1 : 0));
  }, [registry, figureNumber]);

  const handleZoomChange = React.useCallback((imageId: string, state: ZoomState) => {
    if (figureNumber === null) return;
    registry.update(figureNumber, (f) => setZoomState(f, imageId, state));
  }, [registry, figureNumber]);

  const handleExport = React.useCallback(() => {
    if (!figure) return;
    const canvases = canvasRefs.current.filter((c): c is HTMLCanvasElement => c !== null);
    exportFigure(figure, canvases).catch((e: unknown) => {
      setMessage(e instanceof Error ? e.message : String(e));
    });
  }, [figure]);

  if (figureNumber === null) return null;
  if (!figure) {
    return <Typography sx={{ ...typography.label, color: themeColors.textMuted }}>Figure {figureNumber} is not open.</Typography>;
  }
  if (!figure.visible) return null;

  const images = figure.images;
  const isGallery = images.length > 1;
  const displaySize = imageSize ?? (isGallery ? GALLERY_IMAGE_TARGET : SINGLE_IMAGE_TARGET);
  const ncols = Math.min(images.length, MAX_COLUMNS);
  const interactive = figure.zoom !== null;
  const anyZoomed = images.some((image) => isZoomed(getZoomState(figure, image.id)));
  const background = figure.color ? rgbToCss(figure.color) : themeColors.bg;
  const title = figure.name ? `Figure ${figure.number}: ${figure.name}` : `Figure ${figure.number}`;

  const renderMenu = (menu: FigureMenu) => {
    const action = menu.action;
    if (action && menu.children.length === 0) {
      return (
        <Button key={menu.label} size="small" startIcon={<ZoomInIcon sx={{ fontSize: 14 }} />} sx={{ ...compactButton, color: "#000" }} onClick={() => runAction(action)}>
          {menu.label}
        </Button>
      );
    }
    return (
      <Button key={menu.label} size="small" startIcon={<BuildIcon sx={{ fontSize: 14 }} />} sx={{ ...compactButton, color: "#000" }} onClick={(e) => setOpenMenu({ label: menu.label, anchor: e.currentTarget })}>
        {menu.label}
      </Button>
    );
  };

  const activeMenu = openMenu ? figure.menus.find((m) => m.label === openMenu.label) : undefined;

  return (
    <Box className="figure-root" sx={{ bgcolor: background, color: "#000", border: `1px solid ${themeColors.border}`, display: "inline-block" }}>
      {/* Title bar */}
      <Box sx={{ px: 1, py: 0.5, bgcolor: themeColors.controlBg, color: themeColors.text }}>
        <Typography sx={{ ...typography.label, fontWeight: "bold" }}>{title}</Typography>
      </Box>

      {/* Menu bar */}
      {figure.menus.length > 0 && (
        <Stack direction="row" spacing={0.5} sx={{ px: 0.5, borderBottom: `1px solid ${themeColors.border}` }}>
          {figure.menus.map(renderMenu)}
        </Stack>
      )}
      <Menu
        anchorEl={openMenu?.anchor ?? null}
        open={Boolean(openMenu)}
        onClose={() => setOpenMenu(null)}
        PaperProps={{ sx: { bgcolor: themeColors.controlBg, color: themeColors.text, border: `1px solid ${themeColors.border}` } }}
      >
        {activeMenu && activeMenu.children.length === 0 && (
          <MenuItem disabled sx={{ fontSize: 11 }}>{getMessage("no_image_tools")}</MenuItem>
        )}
        {activeMenu?.children.map((item) => (
          <MenuItem key={item.label} sx={{ fontSize: 11 }} onClick={() => { if (item.action) runAction(item.action); }}>
            {item.label}
          </MenuItem>
        ))}
      </Menu>

      {/* Figure toolbar */}
      {figure.toolbar === "figure" && (
        <Stack direction="row" spacing={0.5} alignItems="center" sx={{ px: 0.5, py: 0.25 }}>
          <Button size="small" sx={{ ...compactButton, color: themeColors.accent }} disabled={images.length === 0} onClick={handleExport}>EXPORT</Button>
          <Button size="small" sx={compactButton} disabled={!anyZoomed} onClick={() => registry.update(figure.number, resetZoom)}>RESET</Button>
          {interactive && <Typography sx={{ ...typography.value }}>zoom on</Typography>}
        </Stack>
      )}

      {/* Figure body; channel checkboxes sit at normalized positions along its bottom */}
      <Box sx={{ position: "relative", p: 1, pb: figure.controls.length > 0 ? 5 : 1, minWidth: displaySize }}>
        {images.length === 0 ? (
          <Box sx={{ width: displaySize, height: displaySize / 2, display: "flex", alignItems: "center", justifyContent: "center" }}>
            <Typography sx={{ ...typography.label, color: "#333" }}>No image</Typography>
          </Box>
        ) : (
          <Box sx={{ display: "grid", gridTemplateColumns: `repeat(${ncols}, auto)`, gap: 1 }}>
            {images.map((image, i) => (
              <FigureCanvas
                key={image.id}
                image={image}
                version={version}
                displaySize={displaySize}
                zoomState={getZoomState(figure, image.id)}
                interactive={interactive}
                onZoomChange={(state) => handleZoomChange(image.id, state)}
                onHover={setReadout}
                registerCanvas={(canvas) => { canvasRefs.current[i] = canvas; }}
              />
            ))}
          </Box>
        )}
        <Typography data-testid="pixel-readout" sx={{ ...typography.value, height: 14, mt: 0.5 }}>{readout ?? ""}</Typography>
        {figure.controls.map((control) => (
          <ChannelCheckbox key={control.tag} control={control} onToggle={handleToggle} />
        ))}
      </Box>

      {/* Message box */}
      <Dialog open={message !== null} onClose={() => setMessage(null)}>
        <DialogTitle sx={{ fontSize: 13 }}>{figure.userData?.application ?? "Message"}</DialogTitle>
        <DialogContent>
          <Typography sx={{ fontSize: 12 }}>{message}</Typography>
        </DialogContent>
        <DialogActions>
          <Button size="small" onClick={() => setMessage(null)}>OK</Button>
        </DialogActions>
      </Dialog>
    </Box>
  );
}

// ============================================================================
// Notebook widget
// ============================================================================
export function FigureWidget() {
  const model = useModel();
  const [application] = useModelState<string>("application");
  const [fontSize] = useModelState<number>("font_size");
  const [imageTools] = useModelState<string[]>("image_tools");
  const [frameBytes] = useModelState<DataView>("frame_bytes");
  const [nImages] = useModelState<number>("n_images");
  const [width] = useModelState<number>("width");
  const [height] = useModelState<number>("height");
  const [nChannels] = useModelState<number>("n_channels");
  const [title] = useModelState<string>("title");
  const [figureNumber] = useModelState<number>("figure_number");
  const [referenceOnly] = useModelState<boolean>("reference_only");

  const [registry] = React.useState(() => new FigureRegistry());
  const [number, setNumber] = React.useState<number | null>(null);

  React.useEffect(() => {
    const state: ApplicationState = {
      pipeline: null,
      current: { imageToolsFilenames: imageTools ?? [], fontSize: fontSize || 10 },
    };
    const figure = openFigure(registry, {
      state,
      number: figureNumber > 0 ? figureNumber : undefined,
      properties: referenceOnly ? undefined : { name: title ?? "" },
      application: application || undefined,
    });
    setNumber(figure.number);
  }, [registry, application, fontSize, imageTools, title, figureNumber, referenceOnly]);

  React.useEffect(() => {
    if (number === null) return;
    const floats = frameBytes ? extractFloat32(frameBytes) : null;
    if (!floats || nImages <= 0) {
      registry.setImages(number, []);
      return;
    }
    try {
      registry.setImages(number, splitFrames(floats, nImages, width, height, nChannels));
    } catch (e) {
      console.warn("Figure frames could not be shown:", e);
      registry.setImages(number, []);
    }
  }, [registry, number, frameBytes, nImages, width, height, nChannels]);

  const forwardTool = React.useCallback((name: string) => {
    model.send({ event: "image_tool", name });
  }, [model]);

  return <FigureWindow registry={registry} figureNumber={number} forwardTool={forwardTool} />;
}

export const render = createRender(FigureWidget);
