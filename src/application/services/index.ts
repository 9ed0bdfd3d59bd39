export type { TreeService, TreeDescription, TreeEvaluation, TreeServiceError } from './tree-service.js';
export { DefaultTreeService } from './tree-service.js';
