import type { NextConfig } from "next";
import withPWAInit, { type RuntimeCaching } from "next-pwa";

declare const self: { location: Location };

const runtimeCaching: RuntimeCaching[] = [
  {
    urlPattern: ({ url }: { url: URL }) => url.pathname.startsWith("/_next/static/"),
    handler: "CacheFirst",
    options: {
      cacheName: "next-static-assets",
      expiration: {
        maxEntries: 64,
        maxAgeSeconds: 30 * 24 * 60 * 60,
      },
    },
  },
  {
    // the first page of links stays readable offline
    urlPattern: ({ url }: { url: URL }) =>
      url.origin === self.location.origin && url.pathname === "/api/links",
    handler: "NetworkFirst",
    method: "GET",
    options: {
      cacheName: "links-api",
      networkTimeoutSeconds: 3,
      expiration: {
        maxEntries: 16,
        maxAgeSeconds: 24 * 60 * 60,
      },
    },
  },
  {
    urlPattern: ({ url }: { url: URL }) =>
      url.origin === self.location.origin &&
      (url.pathname === "/api/tags" || url.pathname === "/api/spaces"),
    handler: "StaleWhileRevalidate",
    method: "GET",
    options: {
      cacheName: "labels-api",
      expiration: {
        maxEntries: 8,
        maxAgeSeconds: 7 * 24 * 60 * 60,
      },
    },
  },
];

const withPWA = withPWAInit({
  dest: "public",
  register: true,
  disable: process.env.NODE_ENV === "development",
  skipWaiting: true,
  // a reload on reconnect would drop tentative links still on screen
  reloadOnOnline: false,
  runtimeCaching,
});

const nextConfig: NextConfig = {
  turbopack: {},
};

export default withPWA(nextConfig);
