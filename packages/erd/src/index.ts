export * from './graph';
export * from './table';
export * from './edges';
export * from './ports';
export * from './crowfoot';
export * from './markup';
export { escapeHtml, wrapText } from './text';
