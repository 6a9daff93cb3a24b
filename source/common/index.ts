/**
 * Common infrastructure for the Ink UI.
 * Generic components and hooks with no ranking-specific dependencies.
 */

// Types
export * from './types.js';

// Components
export {default as StatusBar, formatStatus} from './components/StatusBar.js';

// Hooks
export {useCtrlC} from './hooks/useCtrlC.js';
export {useTerminalResize} from './hooks/useTerminalResize.js';
