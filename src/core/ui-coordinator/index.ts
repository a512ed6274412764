/**
 * @fileoverview UI coordinator exports.
 * @module core/ui-coordinator
 */

export { UiCoordinator } from './UiCoordinator';
export type { UiCoordinatorDeps, UiCoordinatorState } from './types';
