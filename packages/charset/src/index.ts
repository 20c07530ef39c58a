export {
  type CharsetLoadOptions,
  DEFAULT_CHARSET_PATH,
  DEFAULT_CODE_OFFSET,
  loadCharsetDirectory,
  loadCharsetFile,
  loadDefaultCharset,
  parseCharsetDocument,
} from "./adapters/fs/charset-loader"
export { CharsetHolder } from "./adapters/holder/charset-holder"
export { CharsetBuilder, type CharsetBuilderOptions } from "./core/charset-builder"
export {
  type CharsetMapping,
  CharsetTable,
  type CharsetTableInit,
} from "./core/charset-table"
export { DECIMAL_DIGITS, digitWidth, maxForWidth } from "./core/digits"
export {
  type CharsetErrorCode,
  CharsetLoadError,
  InvalidCharsetError,
  TableNotInitializedError,
  UnknownCharacterError,
  UnknownCodeError,
} from "./core/errors"
export { type CharsetDocument, charsetDocumentSchema } from "./ports/charset-document"
export type { CharsetProvider } from "./ports/charset-provider"
