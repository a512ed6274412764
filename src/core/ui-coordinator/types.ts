/**
 * @fileoverview UI coordinator types.
 * @module core/ui-coordinator/types
 * @version 1.0.0
 */

import type { UiConfig } from '../../config/uiConfig';
import type { IClock, ILogger } from '../../utils/interfaces';
import type { FocusStack } from '../../modules/focus';
import type { GestureClassifier } from '../../modules/gesture';
import type { InputState } from '../../modules/input';
import type { NavCollapseAnimator, WaveAnimation } from '../../modules/navigation';
import type { ModalGuard, OverlayName } from '../../modules/overlays';
import type { SelectionGrid } from '../../modules/selection';

export interface UiCoordinatorDeps {
    getConfig: () => UiConfig;
    /** Defaults to the monotonic process clock. */
    clock?: IClock;
    /** Shared by every part; otherwise each logs under its own prefix. */
    logger?: ILogger;
    /** Touch-down hit test for the gesture classifier. */
    resolveTouchTarget?: (x: number, y: number) => number | null;
    /** True while the controller mapping popup owns input. */
    isMappingPopupActive?: () => boolean;
}

/**
 * Everything the coordinator owns. One instance per app; no module state
 * lives outside it.
 */
export interface UiCoordinatorState {
    focus: FocusStack;
    nav: NavCollapseAnimator;
    wave: WaveAnimation;
    input: InputState;
    frontGrid: SelectionGrid;
    rearGrid: SelectionGrid;
    gesture: GestureClassifier<number>;
    overlays: Record<OverlayName, ModalGuard>;
}
