import { useNavigate } from "react-router-dom";

export default function Home() {
  const navigate = useNavigate();

  return (
    <div className="container">
      <div className="header">
        <h1>Course Portal</h1>
        <p>Browse the university course catalog or list a new course</p>
      </div>

      <div className="card centered-form">
        <button
          type="button"
          className="btn btn-primary"
          onClick={() => navigate("/catalog")}
          style={{ width: "100%", marginBottom: "12px" }}
        >
          View Course Catalog
        </button>
        <button
          type="button"
          className="btn btn-secondary"
          onClick={() => navigate("/add-course")}
          style={{ width: "100%" }}
        >
          Add a Course
        </button>
      </div>
    </div>
  );
}
