import { vi } from "vitest";

// "server-only" throws outside the react-server condition Next.js resolves with.
vi.mock("server-only", () => ({}));
