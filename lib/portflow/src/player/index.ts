export { GraphTime } from './graph-time';
export { GraphEvents } from './graph-events';
export { GraphPlayer, DEFAULT_FRAMES } from './graph-player';
export { FlowPlayer } from './flow-player';
