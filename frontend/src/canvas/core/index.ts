export { Viewport } from './Viewport';
export type { ViewportState } from './Viewport';
export { RenderLoop } from './RenderLoop';
export type { LayerCallback, LayerTier } from './RenderLoop';
export { HitTester } from './HitTester';
export type { BlockHit, AnchorHit, ConnectionHit, HitResult } from './HitTester';
export { buildScene, homeView, findSceneAnchor, routeSceneConnections } from './scene';
export type { Scene, SceneItem, SceneAnchor, ConnectionRoute } from './scene';
export { buildRenderModel, blockLabels } from './renderModel';
export type { RenderModel } from './renderModel';
