export * from './results';
export * from './trace';
export * from './branchInput';
export * from './selectBranch';
export * from './game';
export * from './session';
