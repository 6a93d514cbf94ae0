export type { PipelineStage, Responder, Route } from './types.js';

export {
  stage1Accept,
  createStage1Accept,
  checkAcceptability,
  type Stage1Options,
} from './stage-1-accept.js';
export { stage2EmptyBody, checkNonEmpty } from './stage-2-empty-body.js';
export { PayloadTranscoder, createStage3Transcode } from './stage-3-transcode.js';
