export {
  loadTemplateDirectory,
  loadTemplateFile,
  DEFAULT_TEMPLATE_EXTENSION,
} from './template-loader.js';
export type { DirectoryLoadOptions } from './template-loader.js';
export { loadFillingFromYAML, loadFillingFromFile } from './filling-loader.js';
