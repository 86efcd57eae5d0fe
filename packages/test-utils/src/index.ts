/**
 * @repweave/test-utils
 *
 * Shared test utilities for repweave
 */

// Fixture loading
export { getFixturePath, loadPgnSync } from './fixtures/loader.js';

// Collaborator fakes
export {
  createMockOpeningBook,
  createMockEvaluator,
  createRecordingWriter,
  createMockExplorer,
  type MockExplorer,
  type MockOpeningBook,
  type MockOpeningBookConfig,
  type MockEvaluator,
  type MockEvaluatorConfig,
  type RecordingWriter,
} from './mocks/mock-collaborators.js';

// Builders
export { LineBuilder, line, fenAfter } from './builders/line-builder.js';
