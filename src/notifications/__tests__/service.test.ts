/**
 * Notifications Service Integration Tests
 *
 * Tests Notification service with mocked Home Assistant API.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock config before importing service
vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
  getNotificationConfig: vi.fn(() => ({
    baseUrl: "http://hass.test:8123",
    token: "test-token",
    timeoutMs: 5000,
  })),
}));

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { getNotificationConfig } from "../../config.js";
// Import after mocks
import { sendNotification } from "../service.js";

describe("Notifications Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("sendNotification", () => {
    test("posts title and message to the notify service", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: true,
          json: () => Promise.resolve([]),
        }),
      );

      // Act
      const result = await sendNotification(
        "mobile_app_pixel",
        "Vind - Wind Warning",
        "STORM VARNING! (45.0 m/s)",
      );

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fetch).toHaveBeenCalledWith(
        "http://hass.test:8123/api/services/notify/mobile_app_pixel",
        expect.objectContaining({
          method: "POST",
          headers: expect.objectContaining({
            Authorization: "Bearer test-token",
          }),
        }),
      );

      const callArgs = vi.mocked(fetch).mock.calls[0];
      const body: unknown = JSON.parse(String(callArgs?.[1]?.body));
      expect(body).toEqual({
        title: "Vind - Wind Warning",
        message: "STORM VARNING! (45.0 m/s)",
      });
    });

    test("returns NOT_CONFIGURED when notifications are disabled", async () => {
      vi.mocked(getNotificationConfig).mockReturnValueOnce(null);
      vi.stubGlobal("fetch", vi.fn());

      const result = await sendNotification("phone", "t", "m");

      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
      expect(fetch).not.toHaveBeenCalled();
    });

    test("returns SEND_FAILED when Home Assistant returns an error", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: false,
          status: 400,
          text: () => Promise.resolve("Service notify.phone not found"),
        }),
      );

      const result = await sendNotification("phone", "t", "m");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: "Home Assistant returned 400: Service notify.phone not found",
        statusCode: 400,
      });
    });

    test("returns NETWORK_ERROR when fetch throws", async () => {
      const cause = new Error("getaddrinfo ENOTFOUND hass.test");
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(cause));

      const result = await sendNotification("phone", "t", "m");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NETWORK_ERROR",
        message: "getaddrinfo ENOTFOUND hass.test",
        cause,
      });
    });
  });
});
