import readline from "node:readline";
import { Chalk, type ChalkInstance } from "chalk";
import { StatusAggregator } from "../aggregator.js";
import { StatusChannel, TaskQueue } from "../channel.js";
import { parseEffort, parseQuality, resolveOutputDir, type ConverterSettings } from "../config.js";
import { FileInventory } from "../inventory.js";
import { DebugLog } from "../logger.js";
import { Selection, visibleEntries } from "../selection.js";
import { SessionController } from "../session.js";
import { errorMessage } from "../utils.js";
import { ConversionWorker } from "../worker.js";
import { overlayDialog, renderScreen, visibleRowCount, type Notice } from "./render.js";
import type {
  ConversionTask,
  Dialogs,
  FileEntry,
  NoticeLevel,
  ProcessRunner,
  StatusUpdate,
  Toolchain,
} from "../types.js";

export const TICK_MS = 50;

const ESC = "\x1b";
const ENTER_ALT_SCREEN = `${ESC}[?1049h${ESC}[?25l`;
const LEAVE_ALT_SCREEN = `${ESC}[?25h${ESC}[?1049l`;
const NAV_KEYS = new Set(["up", "down", "pageup", "pagedown", "k", "j", "g", "G"]);

type Modal =
  | { kind: "confirm"; question: string; resolve: (answer: boolean) => void }
  | { kind: "prompt"; label: string; text: string; resolve: (value: string | null) => void };

/** What the app needs from the keyboard side; process.stdin fits. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** What the app needs from the screen side; process.stdout fits. */
export interface ScreenOutput {
  columns?: number;
  rows?: number;
  write(chunk: string): unknown;
}

export interface AppOptions {
  root: string;
  settings: ConverterSettings;
  tools: Toolchain;
  input?: KeyInput;
  output?: ScreenOutput;
  tickMs?: number;
  run?: ProcessRunner;
}

/**
 * Interactive front end. Owns the UI loop: every tick drains worker updates
 * through the session controller and repaints the screen.
 */
export class ConverterApp implements Dialogs {
  readonly settings: ConverterSettings;
  readonly inventory: FileInventory;
  readonly selection = new Selection();
  readonly aggregator: StatusAggregator;
  readonly controller: SessionController;
  readonly log: DebugLog;
  readonly worker: ConversionWorker;

  private readonly tools: Toolchain;
  private readonly input: KeyInput;
  private readonly output: ScreenOutput;
  private readonly tickMs: number;
  private readonly chalk: ChalkInstance;
  /** Pending dialogs; only the first is on screen and takes keys. */
  private readonly dialogs: Modal[] = [];
  private notice: Notice | null = null;
  private currentRow = 0;
  private scrollOffset = 0;
  private ticking = false;
  private timer: NodeJS.Timeout | undefined;
  private finish: (() => void) | undefined;
  private closing = false;

  constructor(options: AppOptions) {
    this.settings = options.settings;
    this.tools = options.tools;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.tickMs = options.tickMs ?? TICK_MS;
    this.chalk = new Chalk();

    this.inventory = new FileInventory(options.root);
    this.aggregator = new StatusAggregator(this.inventory);
    this.log = new DebugLog(undefined, {
      enabled: this.settings.debug,
      onFailure: () => {
        this.settings.debug = false;
        this.notify("Error writing to debug log. Disabling.", "error");
      },
    });

    const queue = new TaskQueue<ConversionTask>();
    const channel = new StatusChannel<StatusUpdate>();
    this.worker = new ConversionWorker(queue, channel, { tools: this.tools, log: this.log, run: options.run });

    this.controller = new SessionController({
      inventory: this.inventory,
      selection: this.selection,
      aggregator: this.aggregator,
      queue,
      channel,
      worker: this.worker,
      tools: this.tools,
      settings: this.settings,
      dialogs: this,
      log: this.log,
      notify: (message, level) => this.notify(message, level),
    });
  }

  notify(message: string, level: NoticeLevel = "info"): void {
    this.notice = { message, level };
  }

  confirm(question: string): Promise<boolean> {
    if (this.closing) return Promise.resolve(false);
    return new Promise((resolve) => {
      this.dialogs.push({ kind: "confirm", question, resolve });
    });
  }

  promptText(label: string, initialValue: string): Promise<string | null> {
    if (this.closing) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.dialogs.push({ kind: "prompt", label, text: initialValue, resolve });
    });
  }

  private cancelDialogs(): void {
    for (const dialog of this.dialogs.splice(0)) {
      if (dialog.kind === "confirm") dialog.resolve(false);
      else dialog.resolve(null);
    }
  }

  /** Resolves once the user quits and the worker has been stopped. */
  async run(): Promise<void> {
    await this.controller.reload();
    if (!this.tools.encoder) {
      this.notify("FATAL: cjxl not found in PATH. Install libjxl-tools.", "error");
    }

    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.on("keypress", this.onKeypress);
    this.output.write(ENTER_ALT_SCREEN);

    const done = new Promise<void>((resolve) => {
      this.finish = resolve;
    });
    this.timer = setInterval(() => this.tick(), this.tickMs);
    this.draw();

    await done;
  }

  private readonly onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
    this.handleKey(str, key ?? {}).catch((err: unknown) => {
      this.notify(errorMessage(err), "error");
    });
  };

  private tick(): void {
    if (!this.ticking) {
      this.ticking = true;
      this.controller
        .tick()
        .catch((err: unknown) => this.notify(errorMessage(err), "error"))
        .finally(() => {
          this.ticking = false;
        });
    }
    this.clampCursor();
    this.draw();
  }

  private visible(): FileEntry[] {
    return visibleEntries(this.inventory.entries, this.selection, this.aggregator.failedIndices);
  }

  private pageSize(): number {
    return Math.max(visibleRowCount(this.output.rows ?? 24), 1);
  }

  private clampCursor(): void {
    const count = this.visible().length;
    if (this.currentRow >= count) this.currentRow = Math.max(0, count - 1);
    const rows = this.pageSize();
    if (this.currentRow < this.scrollOffset) this.scrollOffset = this.currentRow;
    if (this.currentRow >= this.scrollOffset + rows) this.scrollOffset = this.currentRow - rows + 1;
  }

  private async handleKey(str: string | undefined, key: readline.Key): Promise<void> {
    if (key.ctrl && key.name === "c") {
      await this.quit();
      return;
    }

    const dialog = this.dialogs[0];
    if (dialog) {
      this.handleModalKey(dialog, str, key);
      this.draw();
      return;
    }

    this.aggregator.clearSummary();
    const name = key.name === undefined ? str : key.shift && key.name.length === 1 ? key.name.toUpperCase() : key.name;

    if (name === "escape" || name === "q") {
      if (!this.controller.converting || (await this.confirm("Still converting. Quit anyway?"))) {
        await this.quit();
      }
      return;
    }

    this.notice = null;
    if (name && NAV_KEYS.has(name)) {
      this.navigate(name);
    } else {
      await this.command(name, str);
    }
    this.clampCursor();
    this.draw();
  }

  private handleModalKey(modal: Modal, str: string | undefined, key: readline.Key): void {
    if (modal.kind === "confirm") {
      if (str === "y" || str === "Y") {
        this.dialogs.shift();
        modal.resolve(true);
      } else if (str === "n" || str === "N" || key.name === "escape") {
        this.dialogs.shift();
        modal.resolve(false);
      }
      return;
    }

    if (key.name === "return" || key.name === "enter") {
      this.dialogs.shift();
      modal.resolve(modal.text);
    } else if (key.name === "escape") {
      this.dialogs.shift();
      modal.resolve(null);
    } else if (key.name === "backspace") {
      modal.text = modal.text.slice(0, -1);
    } else if (str && str.length === 1 && str >= " " && str <= "~") {
      modal.text += str;
    }
  }

  private navigate(name: string): void {
    const last = this.visible().length - 1;
    switch (name) {
      case "up":
      case "k":
        if (this.currentRow > 0) this.currentRow--;
        break;
      case "down":
      case "j":
        if (this.currentRow < last) this.currentRow++;
        break;
      case "pageup":
        this.currentRow = Math.max(0, this.currentRow - this.pageSize());
        break;
      case "pagedown":
        this.currentRow = Math.max(0, Math.min(last, this.currentRow + this.pageSize()));
        break;
      case "g":
        this.currentRow = 0;
        this.scrollOffset = 0;
        break;
      case "G":
        this.currentRow = Math.max(0, last);
        break;
    }
  }

  private async command(name: string | undefined, str: string | undefined): Promise<void> {
    const visible = this.visible();

    switch (name) {
      case "space": {
        const entry = visible[this.currentRow];
        if (entry) this.selection.toggle(entry.index);
        return;
      }
      case "a":
        this.selection.selectAll(visible);
        return;
      case "A":
        this.selection.clear();
        return;
      case "return":
      case "enter":
        await this.controller.startBatch();
        return;
      case "f5":
        await this.reload();
        return;
    }

    switch (str) {
      case "f":
      case "F":
        if (this.aggregator.failedIndices.length > 0) {
          this.selection.showOnlyFailed = !this.selection.showOnlyFailed;
          this.currentRow = 0;
          this.scrollOffset = 0;
        }
        return;
      case "b":
      case "B":
        this.settings.debug = !this.settings.debug;
        this.log.enabled = this.settings.debug;
        this.notify(`Debug logging ${this.settings.debug ? "ENABLED" : "DISABLED"}`);
        return;
      case "Q":
        await this.editQuality();
        return;
      case "e":
      case "E":
        await this.editEffort();
        return;
      case "r":
      case "R":
        if (this.controller.converting) {
          this.notify("Cannot change recursion while a conversion is in progress.", "warning");
          return;
        }
        this.settings.recursive = !this.settings.recursive;
        await this.reload();
        return;
      case "o":
      case "O":
        await this.editOutputDir();
        return;
      case "d":
      case "D":
        this.settings.deleteOriginals = !this.settings.deleteOriginals;
        return;
    }
  }

  private async reload(): Promise<void> {
    if (await this.controller.reload()) {
      this.currentRow = 0;
      this.scrollOffset = 0;
    }
  }

  private async editQuality(): Promise<void> {
    const value = await this.promptText("Quality (1-100)", String(this.settings.quality));
    if (value === null) return;
    const quality = parseQuality(value);
    if (quality === null) {
      this.notify("Quality must be between 1 and 100.", "error");
      return;
    }
    this.settings.quality = quality;
    this.notify(`Quality set to ${quality}`);
  }

  private async editEffort(): Promise<void> {
    const value = await this.promptText("Effort (1-9)", String(this.settings.effort));
    if (value === null) return;
    const effort = parseEffort(value);
    if (effort === null) {
      this.notify("Effort must be between 1 and 9.", "error");
      return;
    }
    this.settings.effort = effort;
    this.notify(`Effort set to ${effort}`);
  }

  private async editOutputDir(): Promise<void> {
    const value = await this.promptText("Output Dir (blank=Same as Source)", this.settings.outputDir ?? "");
    if (value === null) return;
    this.settings.outputDir = resolveOutputDir(value);
    this.notify(
      this.settings.outputDir === null
        ? "Output set to same directory as source files."
        : `Output directory set to ${this.settings.outputDir}`,
    );
  }

  private draw(): void {
    if (this.closing) return;

    const width = this.output.columns ?? 80;
    let lines = renderScreen(
      {
        width,
        height: this.output.rows ?? 24,
        root: this.inventory.root,
        settings: this.settings,
        entries: this.visible(),
        records: this.inventory.records,
        selection: this.selection,
        failedCount: this.aggregator.failedIndices.length,
        currentRow: this.currentRow,
        scrollOffset: this.scrollOffset,
        session: this.aggregator.session,
        converting: this.controller.converting,
        summary: this.aggregator.lastSummary,
        notice: this.notice,
        now: Date.now(),
      },
      this.chalk,
    );

    const dialog = this.dialogs[0];
    if (dialog) {
      const text = dialog.kind === "confirm" ? dialog.question : `${dialog.label}: ${dialog.text}`;
      lines = overlayDialog(lines, text, width, this.chalk);
    }

    this.output.write(`${ESC}[H${lines.map((line) => `${line}${ESC}[K`).join("\n")}${ESC}[J`);
  }

  private async quit(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    clearInterval(this.timer);
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write(LEAVE_ALT_SCREEN);
    this.cancelDialogs();

    await this.controller.shutdown();
    this.finish?.();
  }
}
