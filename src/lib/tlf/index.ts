export { classifyTlfPage, isTlfHeading } from "./classifyTlfPage";
export { isTerminationPage } from "./detectTermination";
export { toPageText } from "./pageText";
export {
  sanitizeTlfId,
  tlfPdfPath,
  tlfTextPath,
  NARRATIVE_PDF_PATH,
  NARRATIVE_TEXT_PATH,
  MANIFEST_JSON,
  MANIFEST_CSV,
} from "./outputPaths";
export {
  advanceSegmentation,
  finishSegmentation,
  initialSegmentationScan,
  scanTlfSection,
  segmentTlfPages,
} from "./segmentTlfPages";
export type {
  PageTextReader,
  PageTransition,
  SegmentationResult,
  SegmentationScan,
  SegmentationState,
  SegmentationStep,
} from "./segmentTlfPages";
export {
  FIRST_TLF_PAGE,
  MIN_SOURCE_PAGES,
  NARRATIVE_PAGE_COUNT,
} from "./types";
export type {
  NarrativeRecord,
  PageText,
  SegmentationWarning,
  SegmentationWarningCode,
  SourcePage,
  TlfIdentity,
  TlfKind,
  TlfRecord,
} from "./types";
