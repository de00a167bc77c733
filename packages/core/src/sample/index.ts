export { createSampleGameConfig } from './game';
