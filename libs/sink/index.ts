export type { DiagnosticSink, FileCaseSinkOptions } from './caseFileSink.js';
export { FileCaseSink, formatCaseFile } from './caseFileSink.js';
