/**
 * LayoutPreferencesModel - workspace theme, sidebars and selection
 *
 * Every mutation notifies observers and then queues a save. Saves run one
 * at a time in the background and never throw; failures are logged.
 * flush() waits for the queue to drain.
 */

import { ChangeNotifier } from '../core/change-notifier.js';
import { getErrorMessage } from '../schemas/errors.js';
import { AppTheme, type PanelLayout, type WindowSize } from '../schemas/models.js';
import {
  layoutPreferencesJsonSchema,
  panelLayoutJsonSchema,
  parseWithSchema,
  type LayoutPreferencesJson,
} from '../schemas/persistence.js';
import { ValidationLimits } from '../schemas/validation.js';
import { backupPathFor, readJsonFile, writeJsonWithBackup } from '../storage/backup-file.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('LayoutPreferences');

export const PREFERENCES_VERSION = 1;

export function defaultPanelLayout(): PanelLayout {
  return {
    leftWidth: 250,
    rightWidth: 300,
    leftCollapsed: false,
    rightCollapsed: false,
    minWidth: ValidationLimits.PANEL_MIN_WIDTH,
    maxWidth: ValidationLimits.PANEL_MAX_WIDTH,
  };
}

export function isValidPanelLayout(layout: PanelLayout): boolean {
  const within = (width: number) => width >= layout.minWidth && width <= layout.maxWidth;
  return within(layout.leftWidth) && within(layout.rightWidth);
}

/** Malformed or out-of-bounds layouts decode to the default layout */
export function parsePanelLayout(data: unknown): PanelLayout {
  const result = panelLayoutJsonSchema.safeParse(data ?? {});
  if (!result.success || !isValidPanelLayout(result.data)) {
    return defaultPanelLayout();
  }
  return result.data;
}

interface LayoutState {
  theme: AppTheme;
  panelLayout: PanelLayout;
  selectedAgentId?: string;
  windowSize?: WindowSize;
}

export interface LayoutPreferencesOptions {
  /** Preferences file; the backup is written beside it */
  filePath: string;
  initialTheme?: AppTheme;
  initialPanelLayout?: PanelLayout;
  initialSelectedAgentId?: string;
  initialWindowSize?: WindowSize;
}

export class LayoutPreferencesModel extends ChangeNotifier {
  readonly filePath: string;
  private state: LayoutState;
  private pendingSave: Promise<void> = Promise.resolve();

  constructor(options: LayoutPreferencesOptions) {
    super();
    this.filePath = options.filePath;
    this.state = {
      theme: options.initialTheme ?? AppTheme.DARK,
      panelLayout: { ...(options.initialPanelLayout ?? defaultPanelLayout()) },
      selectedAgentId: options.initialSelectedAgentId,
      windowSize: options.initialWindowSize,
    };
  }

  get currentTheme(): AppTheme {
    return this.state.theme;
  }

  get panelLayout(): Readonly<PanelLayout> {
    return { ...this.state.panelLayout };
  }

  get selectedAgentId(): string | undefined {
    return this.state.selectedAgentId;
  }

  get windowSize(): Readonly<WindowSize> | undefined {
    return this.state.windowSize;
  }

  // ============================================================================
  // THEME
  // ============================================================================

  setTheme(theme: AppTheme): void {
    if (this.state.theme === theme) return;
    this.state.theme = theme;
    this.changed();
  }

  // ============================================================================
  // SIDEBARS
  // ============================================================================

  toggleLeftSidebar(): void {
    this.setPanelLayout({ leftCollapsed: !this.state.panelLayout.leftCollapsed });
  }

  toggleRightSidebar(): void {
    this.setPanelLayout({ rightCollapsed: !this.state.panelLayout.rightCollapsed });
  }

  setLeftSidebarCollapsed(collapsed: boolean): void {
    if (this.state.panelLayout.leftCollapsed === collapsed) return;
    this.setPanelLayout({ leftCollapsed: collapsed });
  }

  setRightSidebarCollapsed(collapsed: boolean): void {
    if (this.state.panelLayout.rightCollapsed === collapsed) return;
    this.setPanelLayout({ rightCollapsed: collapsed });
  }

  /**
   * Resize the side panels. A result outside [minWidth, maxWidth] is
   * rejected: nothing changes and false is returned.
   */
  updatePanelWidths(widths: { leftWidth?: number; rightWidth?: number }): boolean {
    const candidate: PanelLayout = {
      ...this.state.panelLayout,
      leftWidth: widths.leftWidth ?? this.state.panelLayout.leftWidth,
      rightWidth: widths.rightWidth ?? this.state.panelLayout.rightWidth,
    };
    if (!isValidPanelLayout(candidate)) return false;
    this.state.panelLayout = candidate;
    this.changed();
    return true;
  }

  resetPanelLayout(): void {
    this.state.panelLayout = defaultPanelLayout();
    this.changed();
  }

  private setPanelLayout(changes: Partial<PanelLayout>): void {
    this.state.panelLayout = { ...this.state.panelLayout, ...changes };
    this.changed();
  }

  // ============================================================================
  // SELECTION & WINDOW
  // ============================================================================

  setSelectedAgent(agentId: string | undefined): void {
    if (this.state.selectedAgentId === agentId) return;
    this.state.selectedAgentId = agentId;
    this.changed();
  }

  clearSelectedAgent(): void {
    this.setSelectedAgent(undefined);
  }

  updateWindowSize(size: WindowSize | undefined): void {
    const current = this.state.windowSize;
    if (current?.width === size?.width && current?.height === size?.height) return;
    this.state.windowSize = size ? { ...size } : undefined;
    this.changed();
  }

  validate(): boolean {
    return isValidPanelLayout(this.state.panelLayout);
  }

  resetToDefaults(): void {
    this.state = { theme: AppTheme.DARK, panelLayout: defaultPanelLayout() };
    this.changed();
  }

  // ============================================================================
  // PERSISTENCE
  // ============================================================================

  private changed(): void {
    this.notifyListeners();
    this.scheduleSave();
  }

  /** Queue a best-effort save behind any save already in flight */
  private scheduleSave(): void {
    this.pendingSave = this.pendingSave.then(() => this.savePreferences());
  }

  /** Resolves once every queued save has finished */
  async flush(): Promise<void> {
    let observed: Promise<void>;
    do {
      observed = this.pendingSave;
      await observed;
    } while (observed !== this.pendingSave);
  }

  /**
   * Write the preferences file, keeping the previous version as a backup
   * until the write completes. Failures are logged, never thrown.
   */
  async savePreferences(): Promise<void> {
    try {
      await writeJsonWithBackup(this.filePath, this.toJSON());
    } catch (error) {
      logger.warn(`Failed to save layout preferences: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Load from disk. A missing file keeps the current state; an unreadable
   * one falls back to the backup, which is then written back as the
   * primary. Returns where the state came from.
   */
  async loadPreferences(): Promise<'primary' | 'backup' | 'defaults'> {
    try {
      const data = await readJsonFile(this.filePath);
      if (data === undefined) return 'defaults';
      this.apply(LayoutPreferencesModel.decodeState(data));
      return 'primary';
    } catch (error) {
      logger.warn(`Layout preferences unreadable, trying backup: ${getErrorMessage(error)}`);
    }

    try {
      const backup = await readJsonFile(backupPathFor(this.filePath));
      if (backup === undefined) return 'defaults';
      this.apply(LayoutPreferencesModel.decodeState(backup));
      this.scheduleSave();
      await this.flush();
      return 'backup';
    } catch (error) {
      logger.warn(`Failed to load backup preferences: ${getErrorMessage(error)}`);
      return 'defaults';
    }
  }

  private apply(state: LayoutState): void {
    this.state = state;
    this.notifyListeners();
  }

  getDebugInfo(): string {
    const layout = this.state.panelLayout;
    const size = this.state.windowSize;
    return [
      'LayoutPreferencesModel Debug Info:',
      `- Theme: ${this.state.theme}`,
      `- Left Sidebar: ${layout.leftCollapsed ? 'Collapsed' : 'Expanded'} (${layout.leftWidth}px)`,
      `- Right Sidebar: ${layout.rightCollapsed ? 'Collapsed' : 'Expanded'} (${layout.rightWidth}px)`,
      `- Selected Agent: ${this.state.selectedAgentId ?? 'None'}`,
      `- Window Size: ${size ? `${size.width}x${size.height}` : 'Unknown'}`,
      `- Valid State: ${this.validate()}`,
      `- Preferences File: ${this.filePath}`,
    ].join('\n');
  }

  // ============================================================================
  // SERIALIZATION
  // ============================================================================

  toJSON(): LayoutPreferencesJson {
    return {
      currentTheme: this.state.theme,
      panelLayout: { ...this.state.panelLayout },
      selectedAgentId: this.state.selectedAgentId ?? null,
      windowSize: this.state.windowSize ? { ...this.state.windowSize } : null,
      version: PREFERENCES_VERSION,
    };
  }

  private static decodeState(data: unknown): LayoutState {
    const json = parseWithSchema(layoutPreferencesJsonSchema, data);
    return {
      theme: json.currentTheme,
      panelLayout: parsePanelLayout(json.panelLayout),
      selectedAgentId: json.selectedAgentId ?? undefined,
      windowSize: json.windowSize,
    };
  }

  static fromJSON(data: unknown, filePath: string): LayoutPreferencesModel {
    const state = LayoutPreferencesModel.decodeState(data);
    return new LayoutPreferencesModel({
      filePath,
      initialTheme: state.theme,
      initialPanelLayout: state.panelLayout,
      initialSelectedAgentId: state.selectedAgentId,
      initialWindowSize: state.windowSize,
    });
  }
}
