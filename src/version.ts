export const TOOL_NAME = 'code-export-md';
export const VERSION = '0.1.0';
