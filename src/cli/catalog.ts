#!/usr/bin/env node
/**
 * Course catalog from the terminal.
 *
 * Usage:
 *   npm run catalog -- list
 *   npm run catalog -- show <code>
 *   npm run catalog -- add
 */

import readline from "readline";
import dotenv from "dotenv";
import {
  Course,
  COURSE_FIELDS,
  COURSE_FIELD_LABELS,
  REQUIRED_COURSE_FIELDS,
  courseNotFoundMessage,
  parseCourseSubmission,
} from "../domain/course";
import { CourseStore } from "../stores/courseStore";
import { loadConfig } from "../config";

export function formatCourseLine(course: Course): string {
  return `${course.code}  ${course.name} (${course.instructor}, ${course.semester})`;
}

export function formatCourseDetails(course: Course): string {
  const width = Math.max(...COURSE_FIELDS.map(f => COURSE_FIELD_LABELS[f].length));
  return COURSE_FIELDS
    .map(field => `${COURSE_FIELD_LABELS[field].padEnd(width)}  ${course[field] || "-"}`)
    .join("\n");
}

export function listCourses(store: CourseStore): string[] {
  const courses = store.load();
  if (courses.length === 0) {
    return ["No courses in the catalog yet."];
  }
  return courses.map(formatCourseLine);
}

export function showCourse(store: CourseStore, code: string): string {
  const course = store.findByCode(code);
  return course ? formatCourseDetails(course) : courseNotFoundMessage(code);
}

function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, (answer: string) => resolve(answer));
  });
}

/**
 * Prompt for each field, then validate and append like the HTTP form does
 */
export async function addCourse(store: CourseStore): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answers: Record<string, string> = {};

  try {
    for (const field of COURSE_FIELDS) {
      const optional = !REQUIRED_COURSE_FIELDS.includes(field);
      answers[field] = await ask(rl, `${COURSE_FIELD_LABELS[field]}${optional ? " (optional)" : ""}: `);
    }
  } finally {
    rl.close();
  }

  const submission = parseCourseSubmission(answers);
  if (!submission.ok) {
    const labels = submission.missing.map(f => COURSE_FIELD_LABELS[f]).join(", ");
    console.error(`\nAll fields are required! Missing: ${labels}`);
    process.exitCode = 1;
    return;
  }

  store.append(submission.course);
  console.log(`\nCourse added successfully! ${formatCourseLine(submission.course)}`);
}

async function main(): Promise<void> {
  dotenv.config();
  const store = new CourseStore(loadConfig().courseFile);
  const [command, arg] = process.argv.slice(2);

  switch (command) {
    case "list":
      listCourses(store).forEach(line => console.log(line));
      break;
    case "show":
      if (!arg) {
        console.error("Usage: catalog show <code>");
        process.exitCode = 1;
        return;
      }
      console.log(showCourse(store, arg));
      break;
    case "add":
      await addCourse(store);
      break;
    default:
      console.error("Usage: catalog <list | show <code> | add>");
      process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
