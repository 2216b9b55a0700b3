export { createImageInsightRouter, formatCreatedAt } from './image-insight.routes';
export type { ImageInsightRouterDependencies } from './image-insight.routes';
