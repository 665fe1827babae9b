import { findUrl, parseShareDeepLink } from "@/lib/link-url";
import { DEFAULT_SHARE_URI_SCHEME } from "@/lib/config";

export type PendingShare = { url: string };

export type ShareState =
  | { status: "initial" }
  | { status: "url-pending"; share: PendingShare };

type ShareListener = (state: ShareState) => void;

const INITIAL: ShareState = { status: "initial" };

/**
 * Single-slot mailbox for URLs handed over by the share sheet. A share that
 * arrives before anyone listens is held until `consume` reads and clears it,
 * so it is delivered once whether the app was cold or warm started.
 */
export class ShareIntentReconciler {
  private state: ShareState = INITIAL;
  private readonly listeners = new Set<ShareListener>();

  constructor(private readonly scheme: string = DEFAULT_SHARE_URI_SCHEME) {}

  getSnapshot = (): ShareState => this.state;

  subscribe = (listener: ShareListener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Registers `listener` and returns the state at the moment of registration.
   * Nothing can change the mailbox between the read and the registration.
   */
  attach(listener: ShareListener) {
    const snapshot = this.state;
    const unsubscribe = this.subscribe(listener);
    return { snapshot, unsubscribe };
  }

  /** Takes the pending share, if any, and resets the mailbox. */
  consume(): PendingShare | null {
    if (this.state.status !== "url-pending") {
      return null;
    }
    const { share } = this.state;
    this.setState(INITIAL);
    return share;
  }

  /**
   * Accepts free-form shared text. A later share replaces one not yet consumed.
   */
  receive(text: string | null | undefined) {
    const url = text ? findUrl(text) : null;
    if (!url) {
      console.warn("Ignoring share without a link");
      return false;
    }
    this.setState({ status: "url-pending", share: { url } });
    return true;
  }

  /** `scheme` overrides the one the reconciler was built with. */
  receiveDeepLink(uri: string, scheme: string = this.scheme) {
    const shared = parseShareDeepLink(uri, scheme);
    if (!shared) {
      console.warn("Ignoring unrecognised deep link", uri);
      return false;
    }
    return this.receive(shared);
  }

  /** Web share targets split a share across title, text and url. */
  receiveSharePayload(payload: { title?: string | null; text?: string | null; url?: string | null }) {
    const candidates = [payload.url, payload.text, payload.title];
    const match = candidates.find((candidate) => candidate && findUrl(candidate));
    return this.receive(match ?? null);
  }

  private setState(next: ShareState) {
    this.state = next;
    this.listeners.forEach((listener) => listener(next));
  }
}

/**
 * Hooks a consumer up to the mailbox: registers for future shares and then
 * drains one that arrived before the consumer existed. Each share reaches
 * `onShare` once, however often consumers attach.
 */
export function connectShareConsumer(
  reconciler: ShareIntentReconciler,
  onShare: (share: PendingShare) => void
) {
  const deliver = () => {
    const share = reconciler.consume();
    if (share) {
      onShare(share);
    }
  };
  const { snapshot, unsubscribe } = reconciler.attach((state) => {
    if (state.status === "url-pending") {
      deliver();
    }
  });
  if (snapshot.status === "url-pending") {
    deliver();
  }
  return unsubscribe;
}

export const shareIntents = new ShareIntentReconciler();
