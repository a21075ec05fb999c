import { useState, useEffect } from "react";
import { useNavigate, useParams, Link } from "react-router-dom";
import { getCourse, ApiError, type Course } from "../services/api";
import { useToast } from "../components/Toast";

const FIELDS: { key: keyof Course; label: string }[] = [
  { key: "instructor", label: "Instructor" },
  { key: "semester", label: "Semester" },
  { key: "schedule", label: "Schedule" },
  { key: "classroom", label: "Classroom" },
  { key: "prerequisites", label: "Prerequisites" },
  { key: "grading", label: "Grading" },
  { key: "description", label: "Description" },
];

export default function CourseDetails() {
  const { code = "" } = useParams<{ code: string }>();
  const navigate = useNavigate();
  const { showError } = useToast();
  const [course, setCourse] = useState<Course | null>(null);

  useEffect(() => {
    async function loadData() {
      try {
        setCourse(await getCourse(code));
      } catch (err) {
        // Unknown code: back to the catalog with the server's message
        if (err instanceof ApiError && err.status === 404) {
          showError(err.message);
        } else {
          console.error("Failed to load course:", err);
          showError("Failed to load the course. Make sure the API server is running.");
        }
        navigate("/catalog", { replace: true });
      }
    }

    void loadData();
  }, [code, navigate, showError]);

  if (!course) {
    return (
      <div className="loading">
        <div className="loading-spinner"></div>
        <p>Loading course...</p>
      </div>
    );
  }

  return (
    <div className="container">
      <div className="header">
        <h1>
          {course.code}: {course.name}
        </h1>
      </div>

      <div className="card">
        <dl style={{ display: "grid", gridTemplateColumns: "160px 1fr", rowGap: "12px", margin: 0 }}>
          {FIELDS.map(({ key, label }) => (
            <div key={key} style={{ display: "contents" }}>
              <dt style={{ fontWeight: 600, color: "#555" }}>{label}</dt>
              <dd style={{ margin: 0, whiteSpace: "pre-wrap" }}>
                {course[key] || <span style={{ color: "#999" }}>None</span>}
              </dd>
            </div>
          ))}
        </dl>
      </div>

      <Link to="/catalog" className="btn btn-secondary">
        Back to Catalog
      </Link>
    </div>
  );
}
