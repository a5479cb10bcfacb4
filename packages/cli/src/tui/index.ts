/**
 * TUI module exports
 */

export { ViewerScreen, type ViewerScreenOptions } from './screens/viewer.js';
export {
  renderBody,
  renderFooter,
  renderHeader,
  renderHints,
  renderLine,
  renderPromptBar,
  type RenderContext,
} from './render.js';
