// ---------------------------------------------------------------------------
// MMPay SDK – Payments Resource Unit Tests
// ---------------------------------------------------------------------------
// Tests handshake and create-payment for both environments:
//   - Endpoint routing
//   - Exact signed bodies (optional fields omitted when not supplied)
//   - Handshake → create ordering and token threading
//   - Short-circuit on handshake failure
// ---------------------------------------------------------------------------

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { resolveConfig } from "../../src/config";
import { HttpClient } from "../../src/http";
import { PaymentsResource } from "../../src/resources/payments";
import type { Environment, PaymentRequest } from "../../src/types";
import {
  createSpyLogger,
  FIXED_NOW,
  installFetch,
  jsonResponse,
  recorded,
  TEST_CONFIG,
} from "../helpers/fetch";

const NONCE = "1700000000000";
const HANDSHAKE_BODY = '{"orderId":"ORD-1","nonce":"1700000000000"}';
const HANDSHAKE_SIGNATURE =
  "842e675e35df0ffeaa1cf7fa328f2f8a6b723bb2d698d509e1ef17e2a921bf88";
const PAY_BODY =
  '{"appId":"A1","nonce":"1700000000000","amount":1000,"orderId":"ORD-1","items":[{"name":"X","amount":1000,"quantity":1}]}';
const PAY_SIGNATURE =
  "ae6f30613040ecead471147af35f6a56927ed9c584cbe180ac8068d1703def8a";

const ORDER: PaymentRequest = {
  orderId: "ORD-1",
  amount: 1000,
  items: [{ name: "X", amount: 1000, quantity: 1 }],
};

function createResource(environment: Environment): PaymentsResource {
  const config = resolveConfig({ ...TEST_CONFIG, logger: createSpyLogger() });
  return new PaymentsResource(new HttpClient(config), config, environment);
}

/** Mock API: handshake issues `bt-<orderId>`, create echoes a payment. */
function installApi() {
  return installFetch((url, init) => {
    const path = new URL(url).pathname;
    if (path.endsWith("handshake")) {
      const body = JSON.parse(String(init.body));
      return jsonResponse({ token: `bt-${body.orderId}` });
    }
    return jsonResponse({ transactionId: "TX-1", status: "PENDING" });
  });
}

describe("PaymentsResource", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(FIXED_NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("handshake", () => {
    test("should POST the signed handshake body", async () => {
      const fetchMock = installApi();

      await createResource("production").handshake({
        orderId: "ORD-1",
        nonce: NONCE,
      });

      const [request] = recorded(fetchMock);
      expect(request.url).toBe("https://api.example.com/payments/handshake");
      expect(request.body).toBe(HANDSHAKE_BODY);
      expect(request.headers.get("X-Mmpay-Nonce")).toBe(NONCE);
      expect(request.headers.get("X-Mmpay-Signature")).toBe(HANDSHAKE_SIGNATURE);
      expect(request.headers.get("Authorization")).toBe("Bearer pub");
    });

    test("should return the token in the decoded body", async () => {
      installApi();

      const result = await createResource("production").handshake({
        orderId: "ORD-1",
        nonce: NONCE,
      });

      expect(result).toEqual({ ok: true, data: { token: "bt-ORD-1" } });
    });

    test("should route sandbox handshakes to /payments/sandbox-handshake", async () => {
      const fetchMock = installApi();

      await createResource("sandbox").handshake({ orderId: "ORD-1", nonce: NONCE });

      expect(recorded(fetchMock)[0].url).toBe(
        "https://api.example.com/payments/sandbox-handshake",
      );
    });

    test("should return a failure result instead of throwing", async () => {
      installFetch(() => jsonResponse({ message: "nope" }, 403));

      const result = await createResource("production").handshake({
        orderId: "ORD-1",
        nonce: NONCE,
      });

      expect(result).toEqual({
        ok: false,
        error: "HTTP 403: nope",
        code: "forbidden_error",
        statusCode: 403,
        details: '{"message":"nope"}',
      });
    });
  });

  describe("create", () => {
    test("should handshake first, then create with the btoken", async () => {
      const fetchMock = installApi();

      const result = await createResource("production").create(ORDER);

      const [handshake, payment] = recorded(fetchMock);
      expect(fetchMock).toHaveBeenCalledTimes(2);

      expect(handshake.path).toBe("/payments/handshake");
      expect(handshake.body).toBe(HANDSHAKE_BODY);
      expect(handshake.headers.get("X-Mmpay-Signature")).toBe(HANDSHAKE_SIGNATURE);

      expect(payment.path).toBe("/payments/create");
      expect(payment.body).toBe(PAY_BODY);
      expect(payment.headers.get("X-Mmpay-Nonce")).toBe(NONCE);
      expect(payment.headers.get("X-Mmpay-Signature")).toBe(PAY_SIGNATURE);
      expect(payment.headers.get("X-Mmpay-Btoken")).toBe("bt-ORD-1");
      expect(payment.headers.get("Authorization")).toBe("Bearer pub");

      expect(result).toEqual({
        ok: true,
        data: { transactionId: "TX-1", status: "PENDING" },
      });
    });

    test("should omit currency and callbackUrl keys when not supplied", async () => {
      const fetchMock = installApi();

      await createResource("production").create(ORDER);

      const payload = JSON.parse(recorded(fetchMock)[1].body);
      expect(Object.keys(payload)).toEqual([
        "appId",
        "nonce",
        "amount",
        "orderId",
        "items",
      ]);
    });

    test("should omit optional keys explicitly set to undefined", async () => {
      const fetchMock = installApi();

      await createResource("production").create({
        ...ORDER,
        currency: undefined,
        callbackUrl: undefined,
      });

      expect(recorded(fetchMock)[1].body).toBe(PAY_BODY);
    });

    test("should append callbackUrl then currency when supplied", async () => {
      const fetchMock = installApi();

      await createResource("production").create({
        ...ORDER,
        currency: "MMK",
        callbackUrl: "https://shop.example.com/cb",
      });

      const payment = recorded(fetchMock)[1];
      expect(payment.body).toBe(
        '{"appId":"A1","nonce":"1700000000000","amount":1000,"orderId":"ORD-1","items":[{"name":"X","amount":1000,"quantity":1}],"callbackUrl":"https://shop.example.com/cb","currency":"MMK"}',
      );
      expect(payment.headers.get("X-Mmpay-Signature")).toBe(
        "77af645c12520c2395a8038402e294db4fcb5fe0abd698823de4fbc7f549555f",
      );
    });

    test("should pass amounts and items through unvalidated", async () => {
      const fetchMock = installApi();

      await createResource("production").create({
        orderId: "ORD-2",
        amount: -5,
        items: [],
      });

      expect(recorded(fetchMock)[1].body).toBe(
        '{"appId":"A1","nonce":"1700000000000","amount":-5,"orderId":"ORD-2","items":[]}',
      );
    });

    test("should route sandbox payments to the sandbox endpoints", async () => {
      const fetchMock = installApi();

      const result = await createResource("sandbox").create(ORDER);

      expect(recorded(fetchMock).map((r) => r.path)).toEqual([
        "/payments/sandbox-handshake",
        "/payments/sandbox-create",
      ]);
      expect(recorded(fetchMock)[1].body).toBe(PAY_BODY);
      expect(result.ok).toBe(true);
    });

    test("should return the handshake failure and skip create", async () => {
      const fetchMock = installFetch(() =>
        jsonResponse({ message: "Internal Server Error" }, 500),
      );

      const result = await createResource("production").create(ORDER);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(recorded(fetchMock)[0].path).toBe("/payments/handshake");
      expect(result).toEqual({
        ok: false,
        error: "HTTP 500: Internal Server Error",
        code: "api_error",
        statusCode: 500,
        details: '{"message":"Internal Server Error"}',
      });
    });

    test("should fail with missing_token_error when the handshake has no token", async () => {
      const fetchMock = installFetch(() => jsonResponse({ status: "ok" }));

      const result = await createResource("production").create(ORDER);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: false,
        error: "Handshake response did not include a session token",
        code: "missing_token_error",
        statusCode: 0,
        details: '{"status":"ok"}',
      });
    });

    test("should return the create failure when payment is rejected", async () => {
      installFetch((url) =>
        new URL(url).pathname.endsWith("handshake")
          ? jsonResponse({ token: "bt-1" })
          : jsonResponse({ message: "Duplicate order" }, 400),
      );

      const result = await createResource("production").create(ORDER);

      expect(result).toEqual({
        ok: false,
        error: "HTTP 400: Duplicate order",
        code: "invalid_request_error",
        statusCode: 400,
        details: '{"message":"Duplicate order"}',
      });
    });

    test("should keep tokens separate across concurrent payments", async () => {
      const fetchMock = installApi();
      const payments = createResource("production");

      await Promise.all([
        payments.create({ ...ORDER, orderId: "ORD-A" }),
        payments.create({ ...ORDER, orderId: "ORD-B" }),
      ]);

      const creates = recorded(fetchMock).filter((r) => r.path === "/payments/create");
      expect(creates).toHaveLength(2);
      for (const create of creates) {
        const { orderId } = JSON.parse(create.body);
        expect(create.headers.get("X-Mmpay-Btoken")).toBe(`bt-${orderId}`);
      }
    });
  });
});
