/**
 * Course Domain Model
 *
 * A course listing as it appears in the catalog. Every field is free text;
 * `code` is how people refer to a course, but nothing enforces uniqueness.
 *
 * The catalog is simply the ordered list of courses, in the order they
 * were submitted.
 */

export interface Course {
  code: string; // e.g., "CS101"
  name: string;
  instructor: string;
  semester: string; // e.g., "Fall 2024"
  schedule: string; // e.g., "MWF 10:00-10:50"
  classroom: string;
  prerequisites: string; // Free text, may be empty
  grading: string; // e.g., "Letter", "Pass/Fail"
  description: string; // May be empty
}

export type CourseField = keyof Course;

/**
 * Field order used when displaying or persisting a course
 */
export const COURSE_FIELDS: readonly CourseField[] = [
  "code",
  "name",
  "instructor",
  "semester",
  "schedule",
  "classroom",
  "prerequisites",
  "grading",
  "description",
];

/**
 * Fields a submission must fill in. Prerequisites and description may be left blank.
 */
export const REQUIRED_COURSE_FIELDS: readonly CourseField[] = [
  "code",
  "name",
  "instructor",
  "semester",
  "schedule",
  "classroom",
  "grading",
];

export const COURSE_FIELD_LABELS: Record<CourseField, string> = {
  code: "Course Code",
  name: "Course Name",
  instructor: "Instructor",
  semester: "Semester",
  schedule: "Schedule",
  classroom: "Classroom",
  prerequisites: "Prerequisites",
  grading: "Grading",
  description: "Description",
};

// Short field names posted by the plain HTML submission form
const FORM_ALIASES: Partial<Record<CourseField, string>> = {
  classroom: "class",
  grading: "grade",
  description: "des",
  prerequisites: "pre",
};

export type CourseSubmissionResult =
  | { ok: true; course: Course }
  | { ok: false; missing: CourseField[] };

function readField(body: Record<string, unknown>, field: CourseField): string {
  let value = body[field];
  const alias = FORM_ALIASES[field];
  if ((value === undefined || value === null) && alias) {
    value = body[alias];
  }
  return typeof value === "string" ? value : "";
}

/**
 * Validate a submitted course (JSON body or form body).
 * Required fields must be non-empty strings; values are kept exactly as sent.
 */
export function parseCourseSubmission(body: unknown): CourseSubmissionResult {
  const fields: Record<string, unknown> =
    typeof body === "object" && body !== null ? { ...body } : {};

  const course: Course = {
    code: readField(fields, "code"),
    name: readField(fields, "name"),
    instructor: readField(fields, "instructor"),
    semester: readField(fields, "semester"),
    schedule: readField(fields, "schedule"),
    classroom: readField(fields, "classroom"),
    prerequisites: readField(fields, "prerequisites"),
    grading: readField(fields, "grading"),
    description: readField(fields, "description"),
  };

  const missing = REQUIRED_COURSE_FIELDS.filter(field => course[field].length === 0);
  if (missing.length > 0) {
    return { ok: false, missing };
  }

  return { ok: true, course };
}

/**
 * Find a course by its code. First match wins when codes repeat.
 */
export function findCourseByCode(courses: Course[], code: string): Course | null {
  return courses.find(c => c.code === code) || null;
}

export function courseNotFoundMessage(code: string): string {
  return `No course found with code '${code}'.`;
}
