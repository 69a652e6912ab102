/**
 * composable-store
 * ================
 *
 * A unidirectional state runtime. A store holds one state tree, accepts
 * actions, runs composable reducers that mutate the state in place and return
 * effect descriptions, and executes those effects under cancellation ids,
 * feeding the actions they produce back into the same queue.
 *
 * - Serialized, synchronous reduction with published snapshots
 * - Reducer combinators for child state, collections and optional state
 * - Effects with cancellation, debounce and timeouts
 * - Scoped dependency overrides that follow async work
 * - Persisted values shared between stores
 * - An exhaustive test store and a controllable clock
 *
 * @license MIT
 */

// =============================================================================
// CONFIGURATION AND DIAGNOSTICS
// =============================================================================

export { configure, enableDevMode, getConfig, resetConfig } from './config'
export type { DependencyContext, RuntimeConfig } from './config'
export { LOG_PREFIX, describeAction, reportProgrammingError, runtimeWarn, toError } from './diagnostics'
export { cloneState, deepEqual, freezeState, getNestedProperty, isPlainObject, setNestedProperty } from './helpers'
export type { Path, PathValue } from './helpers'
export { createChannel, fromSubscription } from './channel'
export type { Channel } from './channel'

// =============================================================================
// DEPENDENCIES
// =============================================================================

export { ImmediateClock, LiveClock, TestClock } from './clock'
export type { Clock } from './clock'
export {
  DependencyKey,
  DependencyRegistry,
  DependencyValues,
  captureDependencies,
  clockKey,
  constantDate,
  dateKey,
  dependencies,
  dependencyKey,
  incrementingUUID,
  resolve,
  runWithDependencies,
  uuidKey,
  withDependencies
} from './dependencies'
export type {
  DateGenerator,
  DependencyKeyOptions,
  DependencyOverrides,
  DependencyValuesOptions,
  UUIDGenerator
} from './dependencies'

// =============================================================================
// EFFECTS
// =============================================================================

export { CancellationTable, cancellations, hashCancelId } from './cancellation'
export type { CancelId } from './cancellation'
export { EffectTask, effectTaskMachine } from './task'
export type { EffectTaskStatus } from './task'
export { Effect } from './effect'
export type { CancellableOptions, CatchHandler, EffectNode, Result, RunBody, RunOptions, Send } from './effect'
export { runEffect } from './effect-runner'
export type { EffectContext } from './effect-runner'

// =============================================================================
// REDUCERS
// =============================================================================

export {
  Feature,
  combineReducers,
  createReducer,
  emptyReducer,
  provideDependencies,
  reduce,
  scope
} from './reducer'
export type {
  ActionHandlers,
  ActionPrism,
  ReduceFunction,
  Reducer,
  ScopeConfig,
  StateAccessor
} from './reducer'
export { forEach } from './for-each'
export type { ElementAction, ElementId, ForEachConfig } from './for-each'
export { ifCaseLet, ifLet } from './if-let'
export type { CaseAccessor, IfCaseLetConfig, IfLetConfig, OptionalAccessor } from './if-let'
export { onChange } from './on-change'
export type { OnChangeConfig } from './on-change'
export { bindingReducer, bindings, isBindingAction } from './binding'
export type { BindingAction } from './binding'
export { debugActions } from './debug'
export type { DebugOptions } from './debug'

// =============================================================================
// SHARED STATE
// =============================================================================

export {
  FileStorageBackend,
  InMemoryBackend,
  InMemoryFileSystem,
  LiveFileSystem,
  fileStorageKey,
  fileSystemKey,
  inMemoryKey
} from './persistence'
export type { FileSystem, PersistenceBackend, PersistenceKey } from './persistence'
export { Shared, SharedCell, SharedCellRegistry, sharedCells } from './shared'
export type { ObserveOptions, WriteOptions } from './shared'

// =============================================================================
// STORES
// =============================================================================

export { ScopedStore, Store, createStore } from './store'
export type { StateListener, StoreOptions, StoreTask, StoreView } from './store'
export { TestStore } from './test-store'
export type { TestStoreOptions } from './test-store'
