"use client";

import { useEffect } from "react";
import { useRouter, useSearchParams } from "next/navigation";
import { shareIntents } from "@/lib/share-intent";

/** Feeds a share-target or protocol-handler hit into the mailbox, then goes home. */
export function ShareReceiver({ scheme }: { scheme: string }) {
  const searchParams = useSearchParams();
  const router = useRouter();

  useEffect(() => {
    const uri = searchParams.get("uri");
    if (uri) {
      shareIntents.receiveDeepLink(uri, scheme);
    } else {
      shareIntents.receiveSharePayload({
        title: searchParams.get("title"),
        text: searchParams.get("text"),
        url: searchParams.get("url"),
      });
    }
    router.replace("/");
  }, [router, scheme, searchParams]);

  return <p className="text-sm text-slate-500">Opening shared link…</p>;
}
