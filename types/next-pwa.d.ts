declare module "next-pwa" {
  import type { NextConfig } from "next";

  type RuntimeCachingHandler =
    | "CacheFirst"
    | "CacheOnly"
    | "NetworkFirst"
    | "NetworkOnly"
    | "StaleWhileRevalidate";

  export type RuntimeCaching = {
    urlPattern: RegExp | string | ((context: { url: URL; request: Request }) => boolean);
    handler: RuntimeCachingHandler;
    method?: "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
    options?: Record<string, unknown>;
  };

  export type PWAConfig = {
    dest?: string;
    disable?: boolean;
    register?: boolean;
    scope?: string;
    sw?: string;
    skipWaiting?: boolean;
    cacheOnFrontEndNav?: boolean;
    reloadOnOnline?: boolean;
    runtimeCaching?: RuntimeCaching[];
    buildExcludes?: Array<string | RegExp>;
  };

  export default function withPWA(config?: PWAConfig): (nextConfig: NextConfig) => NextConfig;
}
