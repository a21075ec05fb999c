/**
 * Course Store
 *
 * Persists the whole catalog as a single JSON array (the backing file).
 * Every append reads the full file, adds one course at the end and rewrites it.
 *
 * All file access is synchronous: within one process, an append's
 * read-modify-write cannot interleave with another request handler.
 * Sharing the file between processes is not supported.
 */

import fs from "fs";
import path from "path";
import { Course, findCourseByCode } from "../domain/course";

/**
 * Thrown when the backing file exists but does not hold a JSON array of courses
 */
export class CatalogParseError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`Cannot read course catalog at ${filePath}: ${message}`, { cause });
    this.name = "CatalogParseError";
    this.filePath = filePath;
  }
}

export class CourseStore {
  constructor(readonly filePath: string) {}

  /**
   * Load the full catalog in insertion order.
   * A missing backing file is an empty catalog.
   */
  load(): Course[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const raw = fs.readFileSync(this.filePath, "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CatalogParseError(this.filePath, reason, error);
    }

    if (!Array.isArray(parsed)) {
      throw new CatalogParseError(this.filePath, "expected a JSON array");
    }

    const badIndex = parsed.findIndex(
      (entry: unknown) => typeof entry !== "object" || entry === null || Array.isArray(entry)
    );
    if (badIndex !== -1) {
      throw new CatalogParseError(this.filePath, `entry ${badIndex} is not a course object`);
    }

    return parsed;
  }

  /**
   * Append a course to the end of the catalog and rewrite the backing file
   */
  append(course: Course): void {
    const courses = this.load();
    courses.push(course);

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(this.filePath, JSON.stringify(courses, null, 4), "utf-8");
  }

  /**
   * Find a course by code (first match in insertion order)
   */
  findByCode(code: string): Course | null {
    return findCourseByCode(this.load(), code);
  }
}
