"use client";

import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useReducer,
  useRef,
  type ReactNode,
} from "react";
import { getUserFriendlyError } from "@/lib/errors";
import {
  EMPTY_TOAST_QUEUE,
  toastDuration,
  toastQueueReducer,
  type ToastAction,
  type ToastTone,
} from "@/lib/toast-queue";

type ToastContextValue = {
  showToast: (message: string, tone?: ToastTone, suggestion?: string) => void;
  /** Shows the friendly form of `error`, optionally with a follow-up button. */
  showError: (error: unknown, action?: ToastAction) => void;
};

const toneStyles: Record<ToastTone, string> = {
  success: "border-emerald-100 bg-emerald-50 text-emerald-700 shadow-emerald-100/80",
  info: "border-slate-200 bg-white text-slate-700 shadow-slate-200/80",
  error: "border-rose-200 bg-rose-50 text-rose-700 shadow-rose-100/80",
};

const ToastContext = createContext<ToastContextValue | null>(null);

export function ToastProvider({ children }: { children: ReactNode }) {
  const [{ active }, dispatch] = useReducer(toastQueueReducer, EMPTY_TOAST_QUEUE);
  const nextId = useRef(1);

  const push = useCallback(
    (message: string, tone: ToastTone, suggestion?: string, action?: ToastAction) => {
      const id = nextId.current;
      nextId.current += 1;
      dispatch({ type: "push", toast: { id, message, tone, suggestion, action } });
    },
    []
  );

  const showToast = useCallback(
    (message: string, tone: ToastTone = "success", suggestion?: string) =>
      push(message, tone, suggestion),
    [push]
  );

  const showError = useCallback(
    (error: unknown, action?: ToastAction) => {
      const friendly = getUserFriendlyError(error);
      push(friendly.message, friendly.tone, friendly.suggestion, action);
    },
    [push]
  );

  useEffect(() => {
    if (!active) {
      return;
    }
    const timeoutId = window.setTimeout(
      () => dispatch({ type: "dismiss", id: active.id }),
      toastDuration(active)
    );
    return () => window.clearTimeout(timeoutId);
  }, [active]);

  const value = useMemo(() => ({ showToast, showError }), [showToast, showError]);

  return (
    <ToastContext.Provider value={value}>
      {children}
      <div className="pointer-events-none fixed inset-x-0 bottom-4 z-[1200] flex justify-center px-4 sm:bottom-6">
        {active && (
          <div
            role="status"
            className={`pointer-events-auto flex w-full max-w-sm items-center gap-3 rounded-2xl border px-4 py-3 text-sm font-semibold shadow-xl ${
              toneStyles[active.tone]
            }`}
          >
            <span className="flex-1 leading-snug">
              {active.message}
              {active.suggestion && (
                <span className="mt-0.5 block text-xs font-normal opacity-80">
                  {active.suggestion}
                </span>
              )}
            </span>
            {active.action && (
              <button
                type="button"
                onClick={() => {
                  active.action?.run();
                  dispatch({ type: "dismiss", id: active.id });
                }}
                className="text-[10px] font-semibold uppercase tracking-[0.3em] underline"
              >
                {active.action.label}
              </button>
            )}
            <button
              type="button"
              aria-label="Dismiss"
              onClick={() => dispatch({ type: "dismiss", id: active.id })}
              className="text-base leading-none text-slate-400 hover:text-slate-600"
            >
              ×
            </button>
          </div>
        )}
      </div>
    </ToastContext.Provider>
  );
}

export function useToast() {
  const context = useContext(ToastContext);
  if (!context) {
    throw new Error("useToast must be used within a ToastProvider");
  }
  return context;
}
