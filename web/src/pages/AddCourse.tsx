/**
 * Add Course
 *
 * Submission form for a new catalog entry. The server checks the required
 * fields; on rejection the form stays filled in and the empty fields are marked.
 */

import { useState } from "react";
import { useNavigate } from "react-router-dom";
import { addCourse, ApiError, type Course } from "../services/api";
import { useToast } from "../components/Toast";

type FormState = Record<keyof Course, string>;

const EMPTY_FORM: FormState = {
  code: "",
  name: "",
  instructor: "",
  semester: "",
  schedule: "",
  classroom: "",
  prerequisites: "",
  grading: "",
  description: "",
};

const FIELDS: { key: keyof Course; label: string; placeholder: string; optional?: boolean; multiline?: boolean }[] = [
  { key: "code", label: "Course Code", placeholder: "e.g., CS101" },
  { key: "name", label: "Course Name", placeholder: "e.g., Introduction to Computer Science" },
  { key: "instructor", label: "Instructor", placeholder: "e.g., Dr. Rivera" },
  { key: "semester", label: "Semester", placeholder: "e.g., Fall 2024" },
  { key: "schedule", label: "Schedule", placeholder: "e.g., MWF 10:00-10:50" },
  { key: "classroom", label: "Classroom", placeholder: "e.g., Room 204" },
  { key: "prerequisites", label: "Prerequisites", placeholder: "e.g., CS100", optional: true },
  { key: "grading", label: "Grading", placeholder: "e.g., Letter" },
  { key: "description", label: "Description", placeholder: "What the course covers", optional: true, multiline: true },
];

export default function AddCourse() {
  const navigate = useNavigate();
  const { showSuccess, showError } = useToast();
  const [form, setForm] = useState<FormState>(EMPTY_FORM);
  const [missing, setMissing] = useState<string[]>([]);
  const [submitting, setSubmitting] = useState(false);

  const updateField = (key: keyof Course, value: string) => {
    setForm((prev) => ({ ...prev, [key]: value }));
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    setSubmitting(true);
    setMissing([]);

    try {
      const { message } = await addCourse(form);
      showSuccess(message);
      navigate("/catalog");
    } catch (err) {
      if (err instanceof ApiError && err.status === 400) {
        setMissing(err.missing);
        showError(err.message);
      } else {
        console.error("Failed to add course:", err);
        showError("Failed to add course. Make sure the API server is running.");
      }
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <div className="container">
      <div className="header">
        <h1>Add a Course</h1>
      </div>

      <form className="card centered-form" onSubmit={handleSubmit} noValidate>
        {FIELDS.map(({ key, label, placeholder, optional, multiline }) => {
          const invalid = missing.includes(key);
          const inputStyle: React.CSSProperties = invalid ? { borderColor: "#c62828" } : {};

          return (
            <div key={key} style={{ marginBottom: "16px" }}>
              <label htmlFor={key} style={{ display: "block", marginBottom: "8px", fontWeight: 500 }}>
                {label}
                {optional && <span style={{ color: "var(--text-muted)", fontWeight: 400 }}> (optional)</span>}
              </label>
              {multiline ? (
                <textarea
                  id={key}
                  rows={4}
                  value={form[key]}
                  onChange={(e) => updateField(key, e.target.value)}
                  placeholder={placeholder}
                  disabled={submitting}
                  style={inputStyle}
                />
              ) : (
                <input
                  type="text"
                  id={key}
                  value={form[key]}
                  onChange={(e) => updateField(key, e.target.value)}
                  placeholder={placeholder}
                  disabled={submitting}
                  style={inputStyle}
                />
              )}
              {invalid && (
                <p style={{ color: "#c62828", margin: "6px 0 0 0", fontSize: "0.85rem" }}>{label} is required</p>
              )}
            </div>
          );
        })}

        <button type="submit" className="btn btn-primary" disabled={submitting} style={{ width: "100%" }}>
          {submitting ? "Saving..." : "Add Course"}
        </button>
      </form>
    </div>
  );
}
