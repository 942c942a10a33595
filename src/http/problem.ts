export interface FieldError {
  path: string;
  message: string;
}

/** RFC 7807 problem document, extended with the error code and request id. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  code: string;
  detail?: string;
  instance?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemParams = Omit<Problem, "type" | "title">;

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const TITLES: Readonly<Record<string, string>> = {
  INVALID_ARGUMENT: "Invalid argument",
  EMPTY_INPUT: "Empty input",
  NO_MAJORITY_ELEMENT: "No majority element",
  NO_FREQUENT_ELEMENTS: "No frequent elements",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  NOT_FOUND: "Not found",
};

export function problem(params: ProblemParams): Problem {
  return {
    type: `https://errors.freq-summary.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: TITLES[params.code] ?? "Internal error",
    ...params,
  };
}
