// Administrative context hierarchy
export {
  ancestry,
  createAgentContext,
  createCustomContext,
  createFolderContext,
  createJobContext,
  createRootContext,
  createUserContext,
  isJobContext,
  isUserContext,
  isSameContext,
  isWithin,
} from './context.js';
