export class ApiRequestError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, url: string) {
    super(`HTTP ${statusCode} from API: ${url}`);
    this.name = "ApiRequestError";
    this.statusCode = statusCode;
  }
}

export class ApiResponseError extends Error {
  constructor(message: string) {
    super(`Unexpected API response: ${message}`);
    this.name = "ApiResponseError";
  }
}
