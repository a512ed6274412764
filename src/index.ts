/**
 * @fileoverview Public entry point of the UI core.
 * @module index
 * @version 2.0.0
 */

// Coordinator
export { UiCoordinator } from './core';
export type { UiCoordinatorDeps, UiCoordinatorState } from './core';

// Configuration
export { DEFAULT_UI_CONFIG, normalizeUiConfig } from './config/uiConfig';
export type { UiConfig } from './config/uiConfig';

// Shared types and utilities
export * from './types';
export * from './utils';

// Modules
export * from './modules/focus';
export * from './modules/input';
export * from './modules/gesture';
export * from './modules/selection';
export * from './modules/navigation';
export * from './modules/overlays';
export * from './modules/controller-mapping';
