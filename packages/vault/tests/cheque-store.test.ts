import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryRecordStore } from "@cashout/state-store";
import { StoredChequeSource } from "../src/cheque-store.js";
import { lastReceivedChequeKey } from "../src/keys.js";
import { CashoutError } from "../src/types.js";
import { OTHER_VAULT, STRANGER, VAULT, cheque } from "./fixtures.js";

describe("StoredChequeSource", () => {
  let store: InMemoryRecordStore;
  let source: StoredChequeSource;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    source = new StoredChequeSource(store);
  });

  it("returns undefined for a vault without cheques", async () => {
    expect(await source.latestCheque(VAULT)).toBeUndefined();
    expect(await source.uncashedRecordsCount(VAULT)).toBe(0);
  });

  it("returns the latest received cheque", async () => {
    await source.receiveCheque(cheque(100n));
    await source.receiveCheque(cheque(150n));

    expect(await source.latestCheque(VAULT)).toEqual(cheque(150n));
    expect(await source.latestCheque(OTHER_VAULT)).toBeUndefined();
  });

  it("finds a cheque under either spelling of the vault address", async () => {
    const mixed = "0xABCDEF0000000000000000000000000000000001" as const;
    await source.receiveCheque(cheque(5n, { vault: mixed }));

    const found = await source.latestCheque("0xabcdef0000000000000000000000000000000001");
    expect(found?.cumulativePayout).toBe(5n);
    expect(await store.get(lastReceivedChequeKey(mixed))).toBeDefined();
  });

  it("counts received cheques per vault", async () => {
    await source.receiveCheque(cheque(100n));
    await source.receiveCheque(cheque(100n));
    await source.receiveCheque(cheque(1n, { vault: OTHER_VAULT }));

    expect(await source.uncashedRecordsCount(VAULT)).toBe(2);
    expect(await source.uncashedRecordsCount(OTHER_VAULT)).toBe(1);
  });

  it("keeps amounts beyond 64 bits intact", async () => {
    const large = 2n ** 128n + 1n;
    await source.receiveCheque(cheque(large));

    expect((await source.latestCheque(VAULT))?.cumulativePayout).toBe(large);
  });

  it("rejects a decreasing cumulative payout", async () => {
    await source.receiveCheque(cheque(100n));

    await expect(source.receiveCheque(cheque(99n))).rejects.toMatchObject({
      code: "CHEQUE_NOT_INCREASING",
      vault: VAULT,
    });
    expect((await source.latestCheque(VAULT))?.cumulativePayout).toBe(100n);
    expect(await source.uncashedRecordsCount(VAULT)).toBe(1);
  });

  it("rejects a cheque for a different beneficiary", async () => {
    await source.receiveCheque(cheque(100n));

    await expect(
      source.receiveCheque(cheque(200n, { beneficiary: STRANGER })),
    ).rejects.toBeInstanceOf(CashoutError);
    await expect(
      source.receiveCheque(cheque(200n, { beneficiary: STRANGER })),
    ).rejects.toMatchObject({ code: "CHEQUE_BENEFICIARY_MISMATCH" });
  });
});
