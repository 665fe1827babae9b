import type { Metadata, Viewport } from "next";
import { AuthSessionProvider } from "@/components/session-provider";
import { ToastProvider } from "@/components/toast-provider";
import { LinkCollectionProvider } from "@/components/link-collection-context";
import "./globals.css";

export const metadata: Metadata = {
  title: "Linkshelf",
  description: "Save links from anywhere and find them again",
  manifest: "/manifest.webmanifest",
  appleWebApp: {
    capable: true,
    statusBarStyle: "black-translucent",
    title: "Linkshelf",
  },
};

export const viewport: Viewport = {
  width: "device-width",
  initialScale: 1,
  themeColor: "#0f172a",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-slate-50 antialiased">
        <AuthSessionProvider>
          <ToastProvider>
            <LinkCollectionProvider>{children}</LinkCollectionProvider>
          </ToastProvider>
        </AuthSessionProvider>
      </body>
    </html>
  );
}
