export { APlatformOpener } from './APlatformOpener.js';
export { SystemOpener, type Launcher, type LaunchedProcess } from './systemOpener.js';
export {
  PreviewDispatcher,
  fitWithin,
  type PreviewKind,
  type PreviewResult,
  type TextPreview,
  type ImagePreview,
  type ExternalPreview,
  type PreviewDispatcherOptions,
  type Dimensions,
} from './PreviewDispatcher.js';
