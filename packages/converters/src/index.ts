export type { IConverter, ConvertibleKind } from "./converter.interface.js";
export { TextConverter } from "./text-converter.js";
export { PdfConverter } from "./pdf-converter.js";
export { MarkdownConverter, htmlToText } from "./markdown-converter.js";
export { removeNumericTables, isNumericTableRow } from "./numeric-tables.js";
export { classifyFile, classifyExtension } from "./classifier.js";
export { createConverter } from "./factory.js";
