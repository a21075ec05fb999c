/**
 * Header - site title plus the two main destinations.
 */

import { NavLink } from "react-router-dom";

const linkStyle = ({ isActive }: { isActive: boolean }): React.CSSProperties => ({
  color: isActive ? "white" : "rgba(255,255,255,0.75)",
  fontWeight: isActive ? 600 : 500,
  textDecoration: "none",
  fontSize: "0.9rem",
});

export default function Header() {
  return (
    <header
      style={{
        display: "flex",
        alignItems: "center",
        justifyContent: "space-between",
        padding: "12px 24px",
        background: "linear-gradient(135deg, #667eea 0%, #764ba2 100%)",
        color: "white",
      }}
    >
      <NavLink to="/" style={{ color: "white", textDecoration: "none", fontWeight: 700 }}>
        Course Portal
      </NavLink>
      <nav style={{ display: "flex", gap: "20px" }}>
        <NavLink to="/catalog" style={linkStyle}>
          Catalog
        </NavLink>
        <NavLink to="/add-course" style={linkStyle}>
          Add Course
        </NavLink>
      </nav>
    </header>
  );
}
