export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "NOT_FOUND"
  | "NOT_CONFIGURED"
  | "UNAVAILABLE"
  | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title" | "code"> & { code: ProblemCode }): Problem {
  const type = `https://errors.address-search.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "NOT_FOUND":
      return "Not found";
    case "NOT_CONFIGURED":
      return "Not configured";
    case "UNAVAILABLE":
      return "Service unavailable";
    default:
      return "Internal error";
  }
}
