export {
  generateFrameSequence,
  planExport,
  type ExportFrame,
  type ExportSegment,
  type CrossfadeStill,
  type ExportOptions,
  type ExportPlan,
} from './ExportFrameGenerator';

export { writeConcatScript, quoteConcatPath, type SegmentPathResolver } from './ConcatScriptWriter';
