export {
  createSpineState,
  advanceSpines,
  finishSpines,
  mergeSpinePaths,
  trackFromSpinePath,
} from './topology';
export type { SpineColumn, SpineState } from './topology';
export { stitchLines, makeForwardLink } from './stitch';
export {
  createTrackTable,
  reserveTrack,
  openTrack,
  closeTrack,
  isTrackPending,
  getMaxTrackNumber,
  getTrackStartId,
  getTrackEndIds,
} from './tracks';
