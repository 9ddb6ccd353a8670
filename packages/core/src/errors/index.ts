export {
  StorageError,
  ConfigurationError,
  RequestConstructionError,
  TransportError,
  RemoteWriteError,
  RemoteReadError,
  RemoteListError,
  ParseError,
  NotFoundError,
  InvalidPathError,
} from "./catalog.js";
