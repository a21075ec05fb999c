const API_BASE = "http://localhost:3001/api";

// Types (matching backend domain)
export interface Course {
  code: string;
  name: string;
  instructor: string;
  semester: string;
  schedule: string;
  classroom: string;
  prerequisites: string;
  grading: string;
  description: string;
}

export type CourseInput = Omit<Course, "prerequisites" | "description"> &
  Partial<Pick<Course, "prerequisites" | "description">>;

export interface AddCourseResponse {
  message: string;
  course: Course;
}

/**
 * Error returned by the API, with the HTTP status and the server's message.
 * `missing` lists the empty fields when a submission fails validation.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly missing: string[];

  constructor(message: string, status: number, missing: string[] = []) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.missing = missing;
  }
}

function readErrorBody(body: unknown): { error?: string; missing: string[] } {
  if (typeof body !== "object" || body === null) {
    return { missing: [] };
  }
  const error = "error" in body && typeof body.error === "string" ? body.error : undefined;
  const missing =
    "missing" in body && Array.isArray(body.missing)
      ? body.missing.filter((f): f is string => typeof f === "string")
      : [];
  return { error, missing };
}

// API Functions

async function fetchJson<T>(url: string, options?: RequestInit): Promise<T> {
  try {
    const response = await fetch(url, {
      ...options,
      headers: {
        "Content-Type": "application/json",
        ...options?.headers,
      },
    });

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => ({ error: "Unknown error" }));
      const { error, missing } = readErrorBody(body);
      throw new ApiError(error || `HTTP error ${response.status}`, response.status, missing);
    }

    return response.json();
  } catch (err) {
    console.error(`fetchJson error for ${url}:`, err instanceof Error ? err.message : err);
    throw err;
  }
}

export async function getCourses(): Promise<Course[]> {
  return fetchJson(`${API_BASE}/courses`);
}

export async function getCourse(code: string): Promise<Course> {
  return fetchJson(`${API_BASE}/courses/${encodeURIComponent(code)}`);
}

export async function addCourse(input: CourseInput): Promise<AddCourseResponse> {
  return fetchJson(`${API_BASE}/courses`, {
    method: "POST",
    body: JSON.stringify(input),
  });
}
