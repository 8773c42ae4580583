// Toad library entry point
// Import this for library usage: import { ... } from './mod.js'

// Core types and geometry
export * from './src/types.js';
export * from './src/geometry.js';
export * from './src/char-width.js';

// HTML: tokenizer, DOM arena, tree construction, decoding
export * from './src/html/tokenizer.js';
export * from './src/html/dom.js';
export * from './src/html/tree-builder.js';
export * from './src/html/charset.js';
export * from './src/document.js';

// CSS: tokenizer, selectors, values, stylesheet parser
export * from './src/css/tokenizer.js';
export * from './src/css/selector.js';
export * from './src/css/values.js';
export * from './src/css/parser.js';

// Cascade and computed styles
export * from './src/style/properties.js';
export * from './src/style/cascade.js';
export * from './src/style/user-agent.js';

// Layout
export * from './src/layout/box.js';
export * from './src/layout/box-builder.js';
export * from './src/layout/line-breaker.js';
export * from './src/layout/layout.js';

// Forms
export * from './src/forms/form-model.js';

// Paint and terminal output
export * from './src/buffer.js';
export * from './src/paint/color.js';
export * from './src/paint/image-reducer.js';
export * from './src/paint/painter.js';
export * from './src/ansi-output.js';
export * from './src/theme.js';
export * from './src/chrome.js';

// Network
export * from './src/net/url.js';
export * from './src/net/transport.js';
export * from './src/net/image-decoder.js';
export * from './src/net/image-cache.js';

// Browser session, input and terminal
export * from './src/events.js';
export * from './src/input.js';
export * from './src/line-editor.js';
export * from './src/browser.js';
export * from './src/terminal.js';

// Configuration and logging
export * from './src/config/mod.js';
export * from './src/logging.js';
export * from './src/env.js';
export * from './src/utils/error.js';
export { VERSION } from './src/version.js';
