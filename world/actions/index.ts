export * from './types';
export { actionCost, validateAction, resolveAction, splitForForkResources } from './pipeline';
