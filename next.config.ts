import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: ["undici", "xlsx"],
};

export default nextConfig;
