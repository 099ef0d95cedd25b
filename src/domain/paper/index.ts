export type {
  DistributionRow,
  DistributionSummary,
  GeneratedPaper,
  PaperInput,
  PaperOptions,
  PaperProgress,
} from './types';
export { DEFAULT_PAPER_OPTIONS } from './types';
export { PaperOrchestrator } from './PaperOrchestrator';
export { formatDistribution, renderPaperText, summarizeDistribution } from './render';
export type {
  CleanOptions,
  LayoutEntry,
  LayoutHeader,
  LayoutQuestion,
  PaperLayout,
} from './layout';
export {
  cleanPaperLines,
  formatPaperLayout,
  layoutPaper,
  renderLayout,
  replaceSymbols,
} from './layout';
