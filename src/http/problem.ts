export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode = "INVALID_ARGUMENT" | "UNSUPPORTED_MEDIA_TYPE" | "NOT_FOUND" | "INTERNAL";

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
  return {
    type: `https://errors.spell-engine.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: codeToTitle(params.code),
    ...params,
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
    case "INTERNAL":
      return "Internal error";
  }
}
