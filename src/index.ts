// Public library surface.

export * from './version';

export * from './strip/grammar';
export * from './strip/lexerState';
export * from './strip/stripComments';

export * from './markdown/fences';
export * from './markdown/headings';
export * from './markdown/failOpen';
export * from './markdown/normalizeMarkdown';
export * from './markdown/disambiguateHeadings';

export * from './scan/sourceScanner';
export * from './export/directoryTree';
export * from './export/tableOfContents';
export * from './export/assembleDocument';
export * from './export/writeOutputs';
export * from './report/exportReport';

export * from './core/exportProject';
