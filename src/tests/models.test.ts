import { orderToRecord, recordToOrder } from "../models/order";
import { productToRecord } from "../models/product";
import { parseJson, toInt } from "../models/record";
import {
  recordToUser,
  referralCodeFor,
  userIdFromReferralCode,
} from "../models/user";

describe("Record mapping", () => {
  test("toInt coerces stored strings and falls back to 0", () => {
    expect(toInt("42")).toBe(42);
    expect(toInt("12.9")).toBe(12);
    expect(toInt(7.8)).toBe(7);
    expect(toInt("not a number")).toBe(0);
    expect(toInt(undefined)).toBe(0);
  });

  test("toInt rejects text with trailing garbage", () => {
    expect(toInt("12abc")).toBe(0);
    expect(toInt("1e3")).toBe(1000);
    expect(toInt(NaN)).toBe(0);
    expect(toInt(Infinity)).toBe(0);
  });

  test("parseJson returns the fallback for missing or broken text", () => {
    expect(parseJson("[1,2]", [])).toEqual([1, 2]);
    expect(parseJson(undefined, [])).toEqual([]);
    expect(parseJson("{oops", ["fallback"])).toEqual(["fallback"]);
  });

  test("productToRecord writes only supplied fields", () => {
    const record = productToRecord({
      id: 3,
      price: 120,
      created_at: "2025-01-01T00:00:00.000Z",
      updated_at: "2025-01-02T00:00:00.000Z",
    });

    expect(record).toEqual({
      id: "3",
      price: "120",
      created_at: "2025-01-01T00:00:00.000Z",
      updated_at: "2025-01-02T00:00:00.000Z",
    });
  });

  test("order items survive the text encoding", () => {
    const items = [
      { productId: 1, quantity: 2, price: 450 },
      { productId: 4, name: "Vaporesso XROS 3", quantity: 1, price: 2800 },
    ];
    const record = orderToRecord({
      id: 9,
      userId: 5,
      items,
      total: 3700,
      status: "pending",
      created_at: "2025-01-01T00:00:00.000Z",
      updated_at: "2025-01-01T00:00:00.000Z",
    });

    expect(typeof record.items).toBe("string");
    expect(recordToOrder(record).items).toEqual(items);
  });

  test("an order with unreadable items decodes to an empty list", () => {
    const order = recordToOrder({ id: "2", userId: "5", items: "oops" });
    expect(order.items).toEqual([]);
    expect(order.status).toBe("pending");
  });

  test("order items that are not a list of items are dropped", () => {
    expect(recordToOrder({ id: "2", items: "{}" }).items).toEqual([]);

    const order = recordToOrder({
      id: "2",
      items: '[{"productId":1,"quantity":2,"price":450},null,{"productId":"x"},3]',
    });
    expect(order.items).toEqual([{ productId: 1, quantity: 2, price: 450 }]);
  });

  test("recordToUser derives isAdmin from the allow-list", () => {
    const record = { id: "5", username: "mila", bonus: "20" };

    expect(recordToUser(record, new Set([5])).isAdmin).toBe(true);
    expect(recordToUser(record, new Set()).isAdmin).toBe(false);
  });

  test("recordToUser keeps only integer referrals", () => {
    expect(recordToUser({ id: "5", referrals: "{}" }, new Set()).referrals)
      .toEqual([]);
    expect(
      recordToUser({ id: "5", referrals: '[1,"x",2.5,2]' }, new Set())
        .referrals,
    ).toEqual([1, 2]);
  });

  test("referral codes map to and from user ids", () => {
    expect(referralCodeFor(42)).toBe("REF42");
    expect(userIdFromReferralCode("REF42")).toBe(42);
    expect(userIdFromReferralCode(" ref7 ")).toBe(7);
    expect(userIdFromReferralCode("REF")).toBeNull();
    expect(userIdFromReferralCode("REF4x")).toBeNull();
    expect(userIdFromReferralCode("PROMO42")).toBeNull();
  });
});
