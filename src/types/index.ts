export type {
  HttpRequest,
  HttpResponse,
  HeaderValue,
  ResponseBody,
  RequestHandler,
  Application,
  ApplicationExport,
  ApplicationHandle
} from './http';

