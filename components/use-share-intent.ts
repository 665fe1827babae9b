"use client";

import { useEffect, useRef } from "react";
import {
  connectShareConsumer,
  shareIntents,
  type PendingShare,
  type ShareIntentReconciler,
} from "@/lib/share-intent";

/**
 * Delivers shared URLs to `onShare`, including one that arrived before this
 * component mounted. Runs after commit, never during render.
 */
export function useShareIntent(
  onShare: (share: PendingShare) => void,
  reconciler: ShareIntentReconciler = shareIntents
) {
  const handlerRef = useRef(onShare);

  useEffect(() => {
    handlerRef.current = onShare;
  }, [onShare]);

  useEffect(
    () => connectShareConsumer(reconciler, (share) => handlerRef.current(share)),
    [reconciler]
  );
}
