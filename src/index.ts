/**
 * Spoken Tutor Core
 * Public entry point for the route layer
 */

export * from './core/domain';
export * from './core/application';
export * from './adapters';
export * from './settings';
export { TutorApp } from './main';
export type {
  TutorAppDependencies,
  StartConversationOutput,
  ContinueConversationOutput,
  ListDueOptions,
} from './main';
