export {
  VerdictPayloadSchema,
  type VerdictPayload,
  type JsonResult,
  type JsonResultMetadata,
  toVerdictPayload,
  toResultPayload,
  formatJson,
  formatDuration,
} from './json.js';

export {
  formatMarkdown,
  type MarkdownFormatOptions,
} from './markdown.js';
