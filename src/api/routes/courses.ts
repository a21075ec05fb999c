/**
 * Courses API Routes
 *
 * List the catalog, view one course, and submit a new course.
 * Every route records a span, a request count and its duration.
 */

import { Router, type Request } from "express";
import { SpanStatusCode, type Span } from "@opentelemetry/api";
import { courseNotFoundMessage, parseCourseSubmission } from "../../domain/course";
import { CourseStore } from "../../stores/courseStore";
import type { ErrorKind, Telemetry } from "../../telemetry/telemetry";

export interface CoursesRouterDeps {
  store: CourseStore;
  telemetry: Telemetry;
}

function setRequestAttributes(span: Span, req: Request): void {
  span.setAttribute("http.method", req.method);
  span.setAttribute("user.ip", req.ip ?? "unknown");
}

export function createCoursesRouter({ store, telemetry }: CoursesRouterDeps): Router {
  const router = Router();

  const recordSuccess = (route: string, startTime: number) => {
    telemetry.requestCounter.add(1, { route });
    telemetry.operationDuration.record(Date.now() - startTime, { route });
  };

  const recordError = (route: string, error: ErrorKind) => {
    telemetry.errorCounter.add(1, { route, error });
  };

  const recordFailure = (span: Span, route: string, error: unknown) => {
    span.setAttribute("error", true);
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error),
    });
    if (error instanceof Error) {
      span.recordException(error);
    }
    recordError(route, "store_failure");
  };

  /**
   * GET /api/courses
   * The full catalog in insertion order
   */
  router.get("/", (req, res) => {
    const startTime = Date.now();

    telemetry.tracer.startActiveSpan("view_catalog", (span) => {
      try {
        const courses = store.load();

        span.setAttribute("view_catalog.count", courses.length);
        setRequestAttributes(span, req);
        span.addEvent("Rendering Course Catalog");
        recordSuccess("/catalog", startTime);

        res.json(courses);
      } catch (error) {
        recordFailure(span, "/catalog", error);
        console.error("Error fetching courses:", error);
        res.status(500).json({ error: "Failed to load courses" });
      } finally {
        span.end();
      }
    });
  });

  /**
   * GET /api/courses/:code
   * A single course; the first one wins if codes repeat
   */
  router.get("/:code", (req, res) => {
    const startTime = Date.now();
    const { code } = req.params;

    telemetry.tracer.startActiveSpan("view_course_details", (span) => {
      try {
        const course = store.findByCode(code);

        if (!course) {
          const message = courseNotFoundMessage(code);
          span.setAttribute("error", true);
          span.setStatus({ code: SpanStatusCode.ERROR, message: `No course found for code ${code}` });
          span.addEvent(`No course found with code: ${code}`);
          recordError("/course", "course_not_found");
          res.status(404).json({ error: message });
          return;
        }

        span.setAttribute("course_code", code);
        setRequestAttributes(span, req);
        span.addEvent(`Displaying details for course: ${code}`);
        recordSuccess("/course", startTime);

        res.json(course);
      } catch (error) {
        recordFailure(span, "/course", error);
        console.error("Error fetching course:", error);
        res.status(500).json({ error: "Failed to load courses" });
      } finally {
        span.end();
      }
    });
  });

  /**
   * POST /api/courses
   * Submit a new course (JSON or form body)
   */
  router.post("/", (req, res) => {
    const startTime = Date.now();

    telemetry.tracer.startActiveSpan("add_course", (span) => {
      try {
        setRequestAttributes(span, req);
        const submission = parseCourseSubmission(req.body);

        if (!submission.ok) {
          span.setAttribute("error", true);
          span.addEvent("Failed to add course. Missing fields.");
          recordError("/add_course", "missing_fields");
          console.error("Course creation failed. Missing fields.");
          res.status(400).json({ error: "All fields are required!", missing: submission.missing });
          return;
        }

        const { course } = submission;
        store.append(course);

        span.setAttribute("course.code", course.code);
        span.setAttribute("course.name", course.name);
        span.setAttribute("course.instructor", course.instructor);
        span.setAttribute("course.semester", course.semester);
        span.addEvent(`Course ${course.name} added successfully.`);
        span.setStatus({ code: SpanStatusCode.OK });
        recordSuccess("/add_course", startTime);

        console.log(
          `New course added: ${course.name}, Instructor: ${course.instructor}, Semester: ${course.semester}`
        );
        res.status(201).json({ message: "Course added successfully!", course });
      } catch (error) {
        recordFailure(span, "/add_course", error);
        console.error("Error adding course:", error);
        res.status(500).json({ error: "Failed to add course" });
      } finally {
        span.end();
      }
    });
  });

  return router;
}
