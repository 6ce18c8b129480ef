export {
  InvalidArgumentError,
  HttpStatusError,
  UnexpectedResponseError,
  NoMatchingVersionsError,
} from "./errors";
