import type { NextConfig } from "next";

const nextConfig: NextConfig = {
    // pdfjs-dist loads its worker from disk; keep it out of the server bundle.
    serverExternalPackages: ["pdfjs-dist"],
};

export default nextConfig;
