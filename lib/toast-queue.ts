export type ToastTone = "success" | "info" | "error";

export type ToastAction = {
  label: string;
  run: () => void;
};

export type Toast = {
  id: number;
  message: string;
  tone: ToastTone;
  suggestion?: string;
  action?: ToastAction;
};

export type ToastQueueState = {
  active: Toast | null;
  pending: Toast[];
};

export type ToastQueueEvent =
  | { type: "push"; toast: Toast }
  | { type: "dismiss"; id: number };

export const EMPTY_TOAST_QUEUE: ToastQueueState = { active: null, pending: [] };

const BASE_DURATION_MS = 3600;
const EXTENDED_DURATION_MS = 5200;

const sameNotice = (left: Toast, right: Toast) =>
  left.message === right.message && left.tone === right.tone;

/**
 * One toast on screen at a time, the rest wait in order. Pushing the notice
 * that is already last in line is a no-op.
 */
export function toastQueueReducer(state: ToastQueueState, event: ToastQueueEvent): ToastQueueState {
  switch (event.type) {
    case "push": {
      const last = state.pending[state.pending.length - 1] ?? state.active;
      if (last && sameNotice(last, event.toast)) {
        return state;
      }
      return state.active
        ? { active: state.active, pending: [...state.pending, event.toast] }
        : { active: event.toast, pending: state.pending };
    }
    case "dismiss": {
      // a timer can fire for a toast the user already closed
      if (state.active?.id !== event.id) {
        return state;
      }
      const [next = null, ...rest] = state.pending;
      return { active: next, pending: rest };
    }
    default:
      return state;
  }
}

/** Toasts with something more to read or do stay up longer. */
export const toastDuration = (toast: Toast) =>
  toast.suggestion || toast.action ? EXTENDED_DURATION_MS : BASE_DURATION_MS;
