export {
  createFakeObjectStore,
  listBucketResultXml,
  type FakeObjectStore,
  type RecordedRequest,
} from "./fake-object-store.js";
export { readAll } from "./streams.js";
