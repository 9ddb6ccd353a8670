export {
  createDispatcher,
  send,
  readText,
  discard,
  type DispatcherOptions,
  type HttpResponse,
} from "./transport.js";
