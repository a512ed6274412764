/**
 * @fileoverview Core module exports.
 * @module core
 * @version 2.0.0
 */

export { UiCoordinator } from './ui-coordinator';
export type { UiCoordinatorDeps, UiCoordinatorState } from './ui-coordinator';
