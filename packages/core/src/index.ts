/**
 * @lattice-ui/core
 *
 * Retained-mode UI engine: widget tree, reactive state, flex layout, input
 * dispatch, animation scheduling and batched rebuilds.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 * Platform painters and frames plug in through the `Painter` and `Frame` contracts.
 */

// =============================================================================
// Errors & dev warnings
// =============================================================================

export { LatticeError, describeThrown, isLatticeError } from "./errors.js";
export type { LatticeErrorCode } from "./errors.js";

export {
  DEV_MODE,
  consoleWarn,
  createDevWarnings,
  defaultDevWarnings,
  formatDevWarning,
} from "./debug/devWarnings.js";
export type { DevWarningArea, DevWarnings, WarnSink } from "./debug/devWarnings.js";

// =============================================================================
// Geometry & layout math
// =============================================================================

export { ZERO_POINT, ZERO_SIZE } from "./layout/types.js";
export type { Axis, Circle, Point, Rect, Size, SizePolicy } from "./layout/types.js";
export {
  addPoints,
  containsStrict,
  crossOf,
  intersectRect,
  mainOf,
  point,
  pointsEqual,
  rect,
  size,
  sizeOnAxis,
  sizesEqual,
  subPoints,
} from "./layout/geometry.js";
export { distributeInteger } from "./layout/engine/distributeInteger.js";
export { resolveFlexSizes } from "./layout/engine/flex.js";
export type { FlexResolution, FlexSlot } from "./layout/engine/flex.js";

// =============================================================================
// State
// =============================================================================

export { ObservableBase, UpdateListener } from "./state/observable.js";
export type { Observable, Observer } from "./state/observable.js";
export { ListState, ScrollState, State } from "./state/state.js";
export type { StateValidator } from "./state/state.js";

// =============================================================================
// Render nodes
// =============================================================================

export { RenderNode } from "./render/renderNode.js";
export type { Measurer } from "./render/renderNode.js";
export { LayoutRenderNode, ScrollableLayoutRenderNode } from "./render/layoutRenderNode.js";
export type { PlacedChild, ZOrderHost, ZOrderedChild } from "./render/layoutRenderNode.js";

// =============================================================================
// Widgets
// =============================================================================

export { Widget } from "./widgets/widget.js";
export type {
  AnimateToTarget,
  DispatchResult,
  Focusable,
  Scrollable,
  SlideDirection,
  SlideOptions,
  WidgetAnimationOptions,
} from "./widgets/widget.js";
export { Layout } from "./widgets/layout.js";
export { Column, LinearLayout, Row } from "./widgets/linear.js";
export { SCROLL_BAR_SIZE } from "./widgets/scrollbar.js";
export { Box } from "./widgets/box.js";
export { Spacer } from "./widgets/spacer.js";
export { Component, StatefulComponent, defaultCacheKey } from "./widgets/component.js";
export type { CacheKeyOf } from "./widgets/component.js";

// =============================================================================
// Runtime
// =============================================================================

export { BuildOwner, batchUpdates } from "./runtime/buildOwner.js";
export type { Buildable } from "./runtime/buildOwner.js";
export { createWidgetArena } from "./runtime/widgetArena.js";
export type { ArenaMember, WidgetArena, WidgetHandle } from "./runtime/widgetArena.js";
export { FocusManager } from "./runtime/focus.js";
export type { FocusScope } from "./runtime/focus.js";
export type { UiContext } from "./runtime/context.js";

// =============================================================================
// Animation
// =============================================================================

export { Animation } from "./animation/animation.js";
export { Tween, ValueTween, applyTweenProperty } from "./animation/tween.js";
export type {
  TweenOptions,
  TweenProperty,
  TweenTarget,
  TweenableWidget,
} from "./animation/tween.js";
export { AnimatedState } from "./animation/animatedState.js";
export type { AnimatedStateOptions } from "./animation/animatedState.js";
export {
  AnimationScheduler,
  DEFAULT_FPS,
  LOW_REFRESH_FPS,
  systemClock,
} from "./animation/scheduler.js";
export type {
  AnimationSchedulerOptions,
  CancelTimer,
  SchedulerClock,
} from "./animation/scheduler.js";
export { EASING_NAMES, resolveEasing } from "./animation/easing.js";
export {
  clamp01,
  interpolateInt,
  interpolateNumber,
  interpolatePoint,
  interpolateSize,
  normalizeDurationMs,
} from "./animation/interpolate.js";
export { DEFAULT_TRANSITION_MS } from "./animation/types.js";
export type {
  AnimationCallbacks,
  AnimationHost,
  EasingFunction,
  EasingInput,
  EasingName,
  TransitionConfig,
} from "./animation/types.js";

// =============================================================================
// Host contracts
// =============================================================================

export type {
  Color,
  FillStyle,
  Font,
  FontMetrics,
  Painter,
  StrokeStyle,
  Style,
} from "./painter.js";
export { NO_MODIFIERS } from "./events.js";
export type {
  InputCharEvent,
  InputKeyEvent,
  KeyAction,
  KeyCode,
  KeyModifiers,
  MouseButton,
  MouseEvent,
  WheelEvent,
} from "./events.js";
export type { Frame, RedrawHandler, UpdateEvent, UpdateHandler } from "./frame.js";

// =============================================================================
// App
// =============================================================================

export { createApp } from "./app/createApp.js";
export { MAX_FPS_CAP, effectiveFps, readEnvFlag, resolveAppConfig } from "./app/config.js";
export type { EnvSource } from "./app/config.js";
export type { App, AppConfig, CreateAppOptions, ResolvedAppConfig } from "./app/types.js";
