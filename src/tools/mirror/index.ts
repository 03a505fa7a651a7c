export { MirrorSyncTool } from './MirrorSyncTool.js';
export { LocalMirrorTool } from './LocalMirrorTool.js';
export { CheckTool } from './CheckTool.js';
export { BranchesTool } from './BranchesTool.js';
export { TargetsTool } from './TargetsTool.js';
