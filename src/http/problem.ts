export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "DUPLICATE_TITLE"
  | "NOT_FOUND"
  | "UNAVAILABLE"
  | "INTERNAL";

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code: ProblemCode;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title">): Problem {
  const type = `https://errors.termdex.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
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
    case "DUPLICATE_TITLE":
      return "Duplicate title";
    case "NOT_FOUND":
      return "Not found";
    case "UNAVAILABLE":
      return "Service unavailable";
    case "INTERNAL":
      return "Internal error";
  }
}
