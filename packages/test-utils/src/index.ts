export {
  createMockDirectoryClient,
  fileUrlsResponse,
  type MockDirectoryClient,
  type MockFilesResource,
} from "./mocks/directory-client.js";
export {
  createRecordingResolver,
  RecordingResolver,
  type ResolverEntry,
} from "./recording-resolver.js";
