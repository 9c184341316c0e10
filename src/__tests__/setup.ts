/**
 * Vitest 测试设置文件
 */
import { afterEach } from "vitest";
import { cleanup } from "@testing-library/react";
import "@testing-library/jest-dom/vitest";

// globals 未开启，Testing Library 不会自动 cleanup
afterEach(() => {
  cleanup();
});
