import path from "node:path";
import type { ChalkInstance, ForegroundColorName } from "chalk";
import type { ConverterSettings } from "../config.js";
import { OUTPUT_EXTENSION } from "../pathing.js";
import { displayStatus, type Selection } from "../selection.js";
import { formatBytes, formatClock } from "../utils.js";
import type { BatchSession, FileEntry, FileStatus, NoticeLevel, StatusRecord } from "../types.js";

export const MIN_WIDTH = 80;
export const MIN_HEIGHT = 10;
const TITLE = " jxlpress ";

export const STATUS_COLORS: Record<FileStatus, ForegroundColorName> = {
  PENDING: "white",
  SELECTED: "yellow",
  QUEUED: "blue",
  SANITIZING: "magenta",
  CONVERTING: "magenta",
  SUCCESS: "green",
  FAILED: "red",
};

export const NOTICE_COLORS: Record<NoticeLevel, ForegroundColorName> = {
  info: "white",
  success: "green",
  warning: "yellow",
  error: "red",
};

export interface Layout {
  origW: number;
  previewX: number;
  previewW: number;
  statusX: number;
  statusW: number;
  infoX: number;
  infoW: number;
}

export function computeLayout(width: number): Layout {
  const infoW = 24;
  const statusW = 12;
  const sep = 3;
  const origX = 2;
  const infoX = Math.max(width - infoW, 0);
  const statusX = Math.max(infoX - sep - statusW, 0);
  const middle = Math.max(statusX - sep - origX, 0);
  const origW = Math.floor((middle * 2) / 5);
  const previewW = middle - origW;

  return {
    origW,
    previewX: origX + origW + sep,
    previewW,
    statusX,
    statusW,
    infoX,
    infoW,
  };
}

/** Cuts `text` to fit `width` columns with an ellipsis, then pads it. */
export function fit(text: string, width: number): string {
  if (width <= 0) return "";
  const cut = text.length > width - 1 ? `${text.slice(0, Math.max(width - 2, 0))}…` : text;
  return cut.padEnd(width).slice(0, width);
}

export function abbreviatePath(fullPath: string, maxLen: number): string {
  if (fullPath.length <= maxLen) return fullPath;

  const tail = () => "..." + fullPath.slice(-(Math.max(maxLen - 3, 0)));
  const parts = fullPath.split(path.sep).filter(Boolean);
  if (parts.length <= 2) return tail();

  const first = fullPath.startsWith(path.sep) ? path.sep + parts[0] : parts[0];
  const last = parts[parts.length - 1];
  const shortened = [first, "...", last].join(path.sep);
  return shortened.length > maxLen ? tail() : shortened;
}

export interface Notice {
  message: string;
  level: NoticeLevel;
}

export interface ScreenView {
  width: number;
  height: number;
  root: string;
  settings: ConverterSettings;
  entries: readonly FileEntry[];
  records: ReadonlyMap<number, StatusRecord>;
  selection: Selection;
  failedCount: number;
  currentRow: number;
  scrollOffset: number;
  session: BatchSession | null;
  converting: boolean;
  summary: string;
  notice: Notice | null;
  now: number;
}

function renderHeader(view: ScreenView, chalk: ChalkInstance): string {
  const contentX = TITLE.length + 4;
  const available = view.width - contentX - 1;
  let content: string;

  if (view.converting && view.session) {
    const { session } = view;
    const done = session.successCount + session.failedCount;
    const saved = formatBytes(session.bytesBefore - session.bytesAfter);
    content = `Converting: ${done}/${session.totalSelected} | Saved: ${saved} | Elapsed: ${formatClock(view.now - session.startTime)}`;
  } else if (view.summary) {
    content = view.summary;
  } else {
    const sourceLabel = "Source: ";
    const outputLabel = " | Output: ";
    const perPath = Math.floor((available - sourceLabel.length - outputLabel.length) / 2);
    const output =
      view.settings.outputDir === null ? "Same as Source" : abbreviatePath(view.settings.outputDir, perPath);
    const filter = view.selection.showOnlyFailed ? " | FILTER: FAILED" : "";
    content = `${sourceLabel}${abbreviatePath(view.root, perPath)}${outputLabel}${output}${filter}`;
  }

  const line = `  ${TITLE}  ${content.slice(0, Math.max(available, 0))}`;
  return chalk.bgBlue(line.padEnd(view.width - 1));
}

function renderColumns(view: ScreenView, layout: Layout, chalk: ChalkInstance): string {
  const line = " ".repeat(view.width - 1).split("");
  const place = (x: number, text: string) => {
    for (let i = 0; i < text.length && x + i < line.length; i++) line[x + i] = text[i];
  };
  place(2, "Original");
  place(layout.previewX, `Target JXL (*=Selected)`);
  place(layout.statusX, "Status");
  place(layout.infoX, "Info / Savings");
  return chalk.green.bold(line.join(""));
}

export function renderRow(
  entry: FileEntry,
  record: StatusRecord | undefined,
  selected: boolean,
  highlighted: boolean,
  layout: Layout,
  chalk: ChalkInstance,
): string {
  const status = displayStatus(record, selected);
  const color = chalk[STATUS_COLORS[status]];
  const target = record?.targetPath
    ? path.basename(record.targetPath)
    : `${path.parse(entry.name).name}${OUTPUT_EXTENSION}`;
  const gap = "   ";

  const original = fit(entry.name, layout.origW);
  const preview = fit(`${selected ? "*" : " "} ${target}`, layout.previewW);
  const statusCell = fit(status, layout.statusW);
  const info = fit(record?.infoStr ?? "", layout.infoW - 1);

  const cells = [
    "  " + original,
    gap,
    selected ? chalk.yellow(preview) : preview,
    color(statusCell),
    gap,
    color(info),
  ];
  const row = cells.join("");
  return highlighted ? chalk.inverse(row) : row;
}

function renderFooter(view: ScreenView, chalk: ChalkInstance): [string, string] {
  const key = (k: string, text: string, active = false) => {
    const plain = `(${k}) ${text}`;
    const styled = active
      ? `${chalk.black.bgGreen.bold(`(${k})`)} ${chalk.yellow.bold(text)}`
      : `${chalk.green(`(${k})`)} ${chalk.white(text)}`;
    return { plain, styled };
  };

  const { settings } = view;
  const toggles = [
    key("Q", `Qual:${settings.quality}`),
    key("E", `Eff:${settings.effort}`),
    key("R", "Recur", settings.recursive),
    key("D", "DelOrig", settings.deleteOriginals),
    key("O", "Out Dir", settings.outputDir !== null),
    key("B", "Bug Log", settings.debug),
  ];
  if (view.failedCount > 0) toggles.push(key("F", "Filter Failed", view.selection.showOnlyFailed));

  let top = "  ";
  let topWidth = 2;
  for (const toggle of toggles) {
    if (topWidth + toggle.plain.length + 3 > view.width) break;
    top += toggle.styled + "  ";
    topWidth += toggle.plain.length + 2;
  }

  const nav = [
    key("↑↓/jk", "Nav"),
    key("Space", "Select"),
    key("a/A", "All/None"),
    key("Enter", "Convert"),
    key("F5", "Refresh"),
  ];
  const quit = "(ESC/q) Quit";
  let bottom = "  ";
  let bottomWidth = 2;
  for (const item of nav) {
    if (bottomWidth + item.plain.length + quit.length + 4 > view.width) break;
    bottom += item.styled + "  ";
    bottomWidth += item.plain.length + 2;
  }
  const padding = Math.max(view.width - bottomWidth - quit.length - 2, 1);
  bottom += " ".repeat(padding) + chalk.green(quit);

  return [top, bottom];
}

export function visibleRowCount(height: number): number {
  return Math.max(height - 5, 0);
}

/** Full screen, one string per terminal line. */
export function renderScreen(view: ScreenView, chalk: ChalkInstance): string[] {
  if (view.height < MIN_HEIGHT || view.width < MIN_WIDTH) {
    return ["Terminal too small..."];
  }

  const layout = computeLayout(view.width);
  const lines = [renderHeader(view, chalk), renderColumns(view, layout, chalk)];

  const rows = visibleRowCount(view.height);
  for (let i = 0; i < rows; i++) {
    const position = i + view.scrollOffset;
    const entry = view.entries[position];
    if (!entry) {
      lines.push("");
      continue;
    }
    lines.push(
      renderRow(
        entry,
        view.records.get(entry.index),
        view.selection.has(entry.index),
        position === view.currentRow,
        layout,
        chalk,
      ),
    );
  }

  const notice = view.notice ? chalk[NOTICE_COLORS[view.notice.level]](view.notice.message) : "";
  lines.push(`  ${notice}`);
  lines.push(...renderFooter(view, chalk));
  return lines;
}

/** Draws a boxed one-line dialog over the middle of the screen. */
export function overlayDialog(lines: string[], text: string, width: number, chalk: ChalkInstance): string[] {
  const inner = Math.min(text.length + 2, Math.max(width - 4, 10));
  const body = fit(` ${text}`, inner);
  const box = [`┌${"─".repeat(inner)}┐`, `│${body}│`, `└${"─".repeat(inner)}┘`];
  const left = " ".repeat(Math.max(Math.floor((width - inner - 2) / 2), 0));
  const top = Math.max(Math.floor((lines.length - box.length) / 2), 0);

  const result = [...lines];
  box.forEach((row, i) => {
    result[top + i] = left + chalk.bold(row);
  });
  return result;
}
