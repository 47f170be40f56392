export {
  DEFAULT_CONFIG,
  OUTPUT_FORMATS,
  OutputConfigSchema,
  RenderConfigSchema,
  TdocConfigSchema,
  type OutputConfig,
  type OutputFormat,
  type RenderConfig,
  type TdocConfig,
} from "./config";
