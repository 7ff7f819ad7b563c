/**
 * @ddm-status/cli
 *
 * Programmatic access to the command surface: the configured Commander
 * program, the status service factory and the plain-text renderers.
 * The executable lives in bin/ddm-status.ts.
 */

export { program } from './commands/index.js';
export { launchDashboard } from './commands/dashboard.js';
export { createStatusService } from './tui/services/index.js';
export type { IStatusService, HistoryEntry, StatusUpdateEvent } from './tui/services/index.js';
export { LiveStatusService } from './tui/services/LiveStatusService.js';
export { StaticStatusService } from './tui/services/StaticStatusService.js';
export { renderStatus, renderStatusLine, renderSupportBlock, statusJson } from './tui/output/status.js';
export type { StatusJson, RenderOptions } from './tui/output/status.js';
export { renderHistory } from './tui/output/history.js';
