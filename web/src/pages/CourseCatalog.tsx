/**
 * Course Catalog
 *
 * Every course in submission order, each linking to its details.
 */

import { useState, useEffect } from "react";
import { useNavigate } from "react-router-dom";
import { getCourses, type Course } from "../services/api";

export default function CourseCatalog() {
  const navigate = useNavigate();
  const [courses, setCourses] = useState<Course[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState("");

  useEffect(() => {
    async function loadData() {
      try {
        setCourses(await getCourses());
      } catch (err) {
        console.error("Failed to load courses:", err);
        setError("Failed to load the course catalog. Make sure the API server is running.");
      } finally {
        setLoading(false);
      }
    }

    void loadData();
  }, []);

  if (loading) {
    return (
      <div className="loading">
        <div className="loading-spinner"></div>
        <p>Loading courses...</p>
      </div>
    );
  }

  return (
    <div className="container">
      <div className="header">
        <h1>Course Catalog</h1>
        <p>{courses.length} course{courses.length !== 1 ? "s" : ""}</p>
      </div>

      {error ? (
        <div className="card">
          <p style={{ color: "#c62828", textAlign: "center", padding: "24px" }}>{error}</p>
        </div>
      ) : courses.length === 0 ? (
        <div className="card">
          <p style={{ color: "#666", textAlign: "center", padding: "24px" }}>
            No courses yet.
          </p>
        </div>
      ) : (
        <div className="card">
          <table style={{ width: "100%", borderCollapse: "collapse" }}>
            <thead>
              <tr style={{ textAlign: "left", color: "#666", fontSize: "0.85rem" }}>
                <th style={{ padding: "8px 12px" }}>Code</th>
                <th style={{ padding: "8px 12px" }}>Name</th>
                <th style={{ padding: "8px 12px" }}>Instructor</th>
                <th style={{ padding: "8px 12px" }}>Semester</th>
                <th style={{ padding: "8px 12px" }}>Schedule</th>
              </tr>
            </thead>
            <tbody>
              {courses.map((course, index) => (
                <tr
                  // Codes may repeat
                  key={`${course.code}-${index}`}
                  style={{ cursor: "pointer", borderTop: "1px solid #eee" }}
                  onClick={() => navigate(`/course/${encodeURIComponent(course.code)}`)}
                  onMouseEnter={(e) => (e.currentTarget.style.background = "#f8f9fa")}
                  onMouseLeave={(e) => (e.currentTarget.style.background = "transparent")}
                >
                  <td style={{ padding: "10px 12px", fontWeight: 600, color: "#667eea" }}>{course.code}</td>
                  <td style={{ padding: "10px 12px" }}>{course.name}</td>
                  <td style={{ padding: "10px 12px" }}>{course.instructor}</td>
                  <td style={{ padding: "10px 12px" }}>{course.semester}</td>
                  <td style={{ padding: "10px 12px" }}>{course.schedule}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  );
}
