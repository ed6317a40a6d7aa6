// Action metadata types
export * from './metadata.types';

// Configuration types
export * from './config.types';

// Git log, version bucket and changelog types
export * from './changelog.types';

// Node:child_process types
export * from './node-child-process.types';
