export { SceneManager, type SceneManagerConfig, type SceneFilter, type SceneStatus } from './scene-manager.js';
