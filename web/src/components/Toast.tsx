/**
 * Toast Notifications
 *
 * Short-lived success/error messages, shown after a redirect-style navigation
 * (e.g., "Course added successfully!" once the catalog opens).
 */

import { createContext, useContext, useState, useCallback, useRef, type ReactNode } from "react";

type ToastVariant = "success" | "error" | "info";

interface Toast {
  id: string;
  message: string;
  variant: ToastVariant;
}

interface ToastContextType {
  showToast: (message: string, variant?: ToastVariant, duration?: number) => void;
  showSuccess: (message: string) => void;
  showError: (message: string) => void;
}

const ToastContext = createContext<ToastContextType | null>(null);

export function useToast() {
  const context = useContext(ToastContext);
  if (!context) {
    throw new Error("useToast must be used within a ToastProvider");
  }
  return context;
}

export function ToastProvider({ children }: { children: ReactNode }) {
  const [toasts, setToasts] = useState<Toast[]>([]);
  const dismissTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const removeToast = useCallback((id: string) => {
    setToasts((prev) => prev.filter((t) => t.id !== id));
  }, []);

  const showToast = useCallback((message: string, variant: ToastVariant = "info", duration = 4000) => {
    const id = `toast-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    // Only the latest message is shown
    if (dismissTimerRef.current) clearTimeout(dismissTimerRef.current);
    setToasts([{ id, message, variant }]);

    dismissTimerRef.current = setTimeout(() => removeToast(id), duration);
  }, [removeToast]);

  const showSuccess = useCallback((message: string) => showToast(message, "success"), [showToast]);
  const showError = useCallback((message: string) => showToast(message, "error"), [showToast]);

  return (
    <ToastContext.Provider value={{ showToast, showSuccess, showError }}>
      {children}
      {toasts.length > 0 && (
        <div
          style={{
            position: "fixed",
            bottom: "24px",
            right: "24px",
            zIndex: 9999,
            display: "flex",
            flexDirection: "column",
            gap: "8px",
            maxWidth: "400px",
          }}
        >
          {toasts.map((toast) => (
            <ToastItem key={toast.id} toast={toast} onDismiss={() => removeToast(toast.id)} />
          ))}
        </div>
      )}
    </ToastContext.Provider>
  );
}

const VARIANT_COLORS: Record<ToastVariant, { bg: string; border: string; color: string }> = {
  success: { bg: "#f0fdf4", border: "#4ade80", color: "#166534" },
  error: { bg: "#fef2f2", border: "#f87171", color: "#991b1b" },
  info: { bg: "#f8fafc", border: "#7c8fce", color: "#475569" },
};

function ToastItem({ toast, onDismiss }: { toast: Toast; onDismiss: () => void }) {
  const { bg, border, color } = VARIANT_COLORS[toast.variant];

  return (
    <div
      role={toast.variant === "error" ? "alert" : "status"}
      style={{
        background: bg,
        borderLeft: `3px solid ${border}`,
        borderRadius: "6px",
        padding: "12px 14px",
        boxShadow: "0 4px 16px rgba(0,0,0,0.08)",
        display: "flex",
        alignItems: "flex-start",
        gap: "10px",
      }}
    >
      <p style={{ margin: 0, color, fontSize: "0.875rem", flex: 1, lineHeight: 1.5, fontWeight: 500 }}>
        {toast.message}
      </p>
      <button
        onClick={onDismiss}
        style={{
          background: "none",
          border: "none",
          color: "#94a3b8",
          cursor: "pointer",
          padding: 0,
          fontSize: "1rem",
          lineHeight: 1,
        }}
        aria-label="Dismiss"
      >
        ×
      </button>
    </div>
  );
}
