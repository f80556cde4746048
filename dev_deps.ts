export { afterAll, beforeAll, expect, it, vi } from "vitest";
