export { registerResearchRoutes } from './research';
