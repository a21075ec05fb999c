import { BrowserRouter, Routes, Route } from "react-router-dom";
import { Component, type ErrorInfo, type ReactNode } from "react";
import Home from "./pages/Home";
import CourseCatalog from "./pages/CourseCatalog";
import CourseDetails from "./pages/CourseDetails";
import AddCourse from "./pages/AddCourse";
import Header from "./components/Header";
import { ToastProvider } from "./components/Toast";
import "./App.css";

// Error Boundary to catch rendering errors
interface ErrorBoundaryState {
  hasError: boolean;
  error: Error | null;
}

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  constructor(props: { children: ReactNode }) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error) {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error("ErrorBoundary caught an error:", error, errorInfo);
  }

  render() {
    if (this.state.hasError) {
      return (
        <div style={{ padding: "40px", fontFamily: "system-ui, sans-serif" }}>
          <h1 style={{ color: "#d32f2f" }}>Something went wrong</h1>
          <pre style={{
            background: "#f5f5f5",
            padding: "16px",
            borderRadius: "8px",
            overflow: "auto",
            whiteSpace: "pre-wrap"
          }}>
            {this.state.error?.message}
          </pre>
          <button className="btn btn-primary" onClick={() => window.location.reload()}>
            Reload Page
          </button>
        </div>
      );
    }

    return this.props.children;
  }
}

function App() {
  return (
    <ErrorBoundary>
      <ToastProvider>
        <BrowserRouter>
          <div className="app">
            <Header />
            <Routes>
              <Route path="/" element={<Home />} />
              <Route path="/catalog" element={<CourseCatalog />} />
              <Route path="/course/:code" element={<CourseDetails />} />
              <Route path="/add-course" element={<AddCourse />} />
            </Routes>
          </div>
        </BrowserRouter>
      </ToastProvider>
    </ErrorBoundary>
  );
}

export default App;
