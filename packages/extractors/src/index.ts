export { cleanHtml } from "./htmlCleaner";
export {
  LoadSignalsSchema,
  activeSignalCount,
  buildSignalsScript,
  sampleLoadSignals,
} from "./loadingSignals";
export type { LoadSignals, LoadingSignalsConfig } from "./loadingSignals";
export { DomPageStructureProbe } from "./pageNavigation";
export type {
  PageControlSelector,
  PageEntry,
  PageNavigationConfig,
  PageStructureProbe,
} from "./types";
