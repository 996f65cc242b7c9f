export interface Status {
  code: number;
  message: string;
}

export const STATUS_TEXT: Readonly<Record<number, string>> = {
  200: "OK",
  201: "Created",
  400: "Bad Request",
  401: "Unauthorized",
  402: "Payment Required",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  406: "Not Acceptable",
  422: "Unprocessable Entity",
  500: "Internal Server Error",
};

/** Codes outside {@link STATUS_TEXT} resolve to 200 OK. */
export function statusFromCode(code: number): Status {
  const message = STATUS_TEXT[code];
  if (message === undefined) {
    return { code: 200, message: STATUS_TEXT[200] };
  }
  return { code, message };
}

export const Status = {
  ok: (): Status => statusFromCode(200),
  badRequest: (): Status => statusFromCode(400),
  notFound: (): Status => statusFromCode(404),
  methodNotAllowed: (): Status => statusFromCode(405),
  internalServerError: (): Status => statusFromCode(500),
};
