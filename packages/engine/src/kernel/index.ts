export * from './runtime-error.js';
export * from './tree-value.js';
export * from './types-tree.js';
export * from './types-structure.js';
export * from './types-huffman.js';
export * from './tree-node.js';
export * from './avl-balance.js';
export * from './phase-boundaries.js';
export * from './search-tree-core.js';
export * from './bst-engine.js';
export * from './avl-engine.js';
export * from './huffman-codes.js';
export * from './huffman-engine.js';
export * from './schemas-tree.js';
export * from './serde.js';
