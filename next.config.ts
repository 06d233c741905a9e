import type { NextConfig } from "next";

const isGitHubPages = process.env.GITHUB_PAGES === "true";

const nextConfig: NextConfig = {
  output: "export",
  images: {
    unoptimized: true,
  },
  basePath: isGitHubPages ? "/chip8-emulator" : "",
  assetPrefix: isGitHubPages ? "/chip8-emulator/" : "",
};

export default nextConfig;
