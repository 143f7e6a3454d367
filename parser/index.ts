// Node vocabulary
export * from './ast-types.js';
export * from './ast-details.js';

// Document tree
export * from './ast-nodes.js';
export * from './block-nodes.js';
export * from './span-nodes.js';
export * from './text-nodes.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';

// Events and consumers
export * from './parser-interfaces.js';
export * from './parser-object.js';
export * from './dom-parser.js';
export * from './html-renderer.js';
export * from './markdown-it-engine.js';

// Output
export * from './output-buffer.js';
export * from './escaping.js';
export * from './entities.js';
export * from './errors.js';
