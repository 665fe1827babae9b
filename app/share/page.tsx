import { Suspense } from "react";
import { ShareReceiver } from "@/components/share-receiver";
import { readConfig } from "@/lib/config";

// SHARE_URI_SCHEME is read per request
export const dynamic = "force-dynamic";

export default function SharePage() {
  const { shareUriScheme } = readConfig();
  return (
    <main className="mx-auto max-w-2xl px-4 py-10">
      <Suspense fallback={<p className="text-sm text-slate-500">Opening shared link…</p>}>
        <ShareReceiver scheme={shareUriScheme} />
      </Suspense>
    </main>
  );
}
