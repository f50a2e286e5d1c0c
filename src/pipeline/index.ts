export {
  Extractor,
  type ExtractorOptions,
  type ConfigProvider,
} from './extractor.js';
