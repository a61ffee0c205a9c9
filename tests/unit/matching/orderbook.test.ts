/**
 * Unit tests for OrderBook placement and matching
 *
 * Tests:
 * - Collateral locking for resting orders
 * - Crossing at the maker's price, inclusive of equal prices
 * - Price-time priority on both sides
 * - Partial fills and resting remainders
 * - All-or-nothing placement on failure
 * - Single placement per order and exact collateral arithmetic
 * - Optional pruning of filled orders
 */

import { describe, it, expect, beforeEach } from "vitest";
import Decimal from "decimal.js";
import { AccountCap, accountIdOf } from "../../../src/ledger";
import { Order } from "../../../src/matching";
import { AccountNotFoundError, InsufficientFundsError, InvariantViolationError } from "../../../src/errors";
import { createAccount, createMarket, fund, type TestMarket } from "../../setup/test-fixtures";
import { balancesOf, engineErrorCode, expectConserved, expectDecimalEquals, expectSorted, ticksOf } from "../../setup/test-helpers";

describe("OrderBook", () => {
    let market: TestMarket;

    beforeEach(() => {
        market = createMarket();
    });

    describe("resting orders", () => {
        it("should lock price × quantity quote for a bid with nothing to match", () => {
            const user1 = createAccount(market, { quote: 1000 });

            const result = market.book.placeBid(Order.bid(user1, 3, 10));

            expect(balancesOf(market.book, user1)).toEqual({
                baseLocked: "0",
                baseUnlocked: "0",
                quoteLocked: "30",
                quoteUnlocked: "970",
            });
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["10"] }]);
            expect(ticksOf(market.book, "ask")).toEqual([]);
            expect(result.status).toBe("open");
            expect(result.fills).toEqual([]);
            expect(result.rested).toBe(true);
            expectDecimalEquals(result.collateral, 30);
            expectDecimalEquals(result.lockedRemainder, 30);
            expectConserved(market);
        });

        it("should lock quantity base for an ask with nothing to match", () => {
            const seller = createAccount(market, { base: 20 });

            market.book.placeAsk(Order.ask(seller, 7, 4));

            expect(balancesOf(market.book, seller)).toEqual({
                baseLocked: "4",
                baseUnlocked: "16",
                quoteLocked: "0",
                quoteUnlocked: "0",
            });
            expect(ticksOf(market.book, "ask")).toEqual([{ price: "7", quantities: ["4"] }]);
            expectConserved(market);
        });

        it("should rest a bid priced below every ask fully collateralized", () => {
            const seller = createAccount(market, { base: 100 });
            const buyer = createAccount(market, { quote: 100 });
            market.book.placeAsk(Order.ask(seller, 5, 4));
            market.book.placeAsk(Order.ask(seller, 6, 1));

            const result = market.book.placeBid(Order.bid(buyer, 4, 2));

            expect(result.fills).toEqual([]);
            expect(result.status).toBe("open");
            expect(balancesOf(market.book, buyer)).toEqual({
                baseLocked: "0",
                baseUnlocked: "0",
                quoteLocked: "8",
                quoteUnlocked: "92",
            });
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "4", quantities: ["2"] }]);
            expect(ticksOf(market.book, "ask")).toEqual([
                { price: "5", quantities: ["4"] },
                { price: "6", quantities: ["1"] },
            ]);
            expectConserved(market);
        });
    });

    describe("crossing", () => {
        it("should settle an ask against a resting bid at an equal price", () => {
            const user1 = createAccount(market, { quote: 1000 });
            const user2 = createAccount(market, { base: 500 });
            const bid = Order.bid(user1, 3, 10);
            market.book.placeBid(bid);

            const result = market.book.placeAsk(Order.ask(user2, 3, 5));

            expect(balancesOf(market.book, user2)).toEqual({
                baseLocked: "0",
                baseUnlocked: "495",
                quoteLocked: "0",
                quoteUnlocked: "15",
            });
            expect(balancesOf(market.book, user1)).toEqual({
                baseLocked: "0",
                baseUnlocked: "5",
                quoteLocked: "15",
                quoteUnlocked: "970",
            });
            expect(result.status).toBe("filled");
            expect(result.fills).toHaveLength(1);
            expect(result.fills[0].makerOrderId).toBe(bid.orderId);
            expect(result.fills[0].makerId).toBe(accountIdOf(user1));
            expect(result.fills[0].takerId).toBe(accountIdOf(user2));
            expectDecimalEquals(result.fills[0].price, 3);
            expectDecimalEquals(result.fills[0].quantity, 5);
            expectDecimalEquals(result.fills[0].quoteAmount, 15);
            expectDecimalEquals(bid.quantity, 5);
            expectConserved(market);
        });

        it("should leave fully filled orders in place with zero quantity", () => {
            const user1 = createAccount(market, { quote: 1000 });
            const user2 = createAccount(market, { base: 500 });
            market.book.placeBid(Order.bid(user1, 3, 10));

            const result = market.book.placeAsk(Order.ask(user2, 3, 5));

            expect(result.rested).toBe(true);
            expect(ticksOf(market.book, "ask")).toEqual([{ price: "3", quantities: ["0"] }]);
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["5"] }]);
            expect(market.book.snapshot().asks).toEqual([]);
        });

        it("should settle a bid at the maker's lower price and keep the surplus locked", () => {
            const seller = createAccount(market, { base: 10 });
            const buyer = createAccount(market, { quote: 100 });
            market.book.placeAsk(Order.ask(seller, 3, 2));

            const result = market.book.placeBid(Order.bid(buyer, 5, 2));

            expect(balancesOf(market.book, seller)).toEqual({
                baseLocked: "0",
                baseUnlocked: "8",
                quoteLocked: "0",
                quoteUnlocked: "6",
            });
            expect(balancesOf(market.book, buyer)).toEqual({
                baseLocked: "0",
                baseUnlocked: "2",
                quoteLocked: "4",
                quoteUnlocked: "90",
            });
            expect(result.status).toBe("filled");
            expectDecimalEquals(result.fills[0].price, 3);
            expectDecimalEquals(result.lockedRemainder, 4);
            expectConserved(market);
        });

        it("should fill same-price makers first in, first out", () => {
            const a = createAccount(market, { base: 10 });
            const b = createAccount(market, { base: 10 });
            const buyer = createAccount(market, { quote: 100 });
            const first = Order.ask(a, 3, 2);
            const second = Order.ask(b, 3, 2);
            market.book.placeAsk(first);
            market.book.placeAsk(second);

            const result = market.book.placeBid(Order.bid(buyer, 3, 3));

            expect(result.fills.map((f) => [f.makerOrderId, f.quantity.toString()])).toEqual([
                [first.orderId, "2"],
                [second.orderId, "1"],
            ]);
            expect(ticksOf(market.book, "ask")).toEqual([{ price: "3", quantities: ["0", "1"] }]);
            expect(balancesOf(market.book, a).quoteUnlocked).toBe("6");
            expect(balancesOf(market.book, b).quoteUnlocked).toBe("3");
            expect(balancesOf(market.book, b).baseLocked).toBe("1");
            expectConserved(market);
        });

        it("should sweep asks from the lowest price up to the bid's limit", () => {
            const a = createAccount(market, { base: 10 });
            const b = createAccount(market, { base: 10 });
            const c = createAccount(market, { base: 10 });
            const buyer = createAccount(market, { quote: 100 });
            market.book.placeAsk(Order.ask(a, 4, 2));
            market.book.placeAsk(Order.ask(b, 3, 2));
            market.book.placeAsk(Order.ask(c, 5, 2));

            const result = market.book.placeBid(Order.bid(buyer, 4, 3));

            expect(result.fills.map((f) => [f.makerId, f.price.toString(), f.quantity.toString()])).toEqual([
                [accountIdOf(b), "3", "2"],
                [accountIdOf(a), "4", "1"],
            ]);
            expect(balancesOf(market.book, buyer)).toEqual({
                baseLocked: "0",
                baseUnlocked: "3",
                quoteLocked: "2",
                quoteUnlocked: "88",
            });
            expect(ticksOf(market.book, "ask")).toEqual([
                { price: "3", quantities: ["0"] },
                { price: "4", quantities: ["1"] },
                { price: "5", quantities: ["2"] },
            ]);
            expectConserved(market);
        });

        it("should sweep bids from the highest price down and rest the remainder", () => {
            const a = createAccount(market, { quote: 100 });
            const b = createAccount(market, { quote: 100 });
            const seller = createAccount(market, { base: 10 });
            market.book.placeBid(Order.bid(a, 2, 3));
            market.book.placeBid(Order.bid(b, 4, 1));

            const result = market.book.placeAsk(Order.ask(seller, 2, 5));

            expect(result.fills.map((f) => [f.makerId, f.price.toString(), f.quantity.toString(), f.quoteAmount.toString()])).toEqual([
                [accountIdOf(b), "4", "1", "4"],
                [accountIdOf(a), "2", "3", "6"],
            ]);
            expect(result.status).toBe("partial");
            expectDecimalEquals(result.filledQuantity, 4);
            expectDecimalEquals(result.remainingQuantity, 1);
            expectDecimalEquals(result.lockedRemainder, 1);
            expect(balancesOf(market.book, seller)).toEqual({
                baseLocked: "1",
                baseUnlocked: "5",
                quoteLocked: "0",
                quoteUnlocked: "10",
            });
            expect(balancesOf(market.book, a)).toEqual({
                baseLocked: "0",
                baseUnlocked: "3",
                quoteLocked: "0",
                quoteUnlocked: "94",
            });
            expect(ticksOf(market.book, "ask")).toEqual([{ price: "2", quantities: ["1"] }]);
            expectConserved(market);
        });

        it("should skip zero-quantity makers left in a tick", () => {
            const a = createAccount(market, { quote: 100 });
            const seller = createAccount(market, { base: 10 });
            market.book.placeBid(Order.bid(a, 3, 1));
            market.book.placeAsk(Order.ask(seller, 3, 1));
            market.book.placeBid(Order.bid(a, 3, 2));

            const result = market.book.placeAsk(Order.ask(seller, 3, 2));

            expect(result.fills).toHaveLength(1);
            expectDecimalEquals(result.fills[0].quantity, 2);
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["0", "0"] }]);
            expectConserved(market);
        });

        it("should keep both sides sorted through mixed placements", () => {
            const trader = createAccount(market, { base: 1000, quote: 100000 });
            for (const price of [50, 20, 70, 10, 40]) {
                market.book.placeBid(Order.bid(trader, price, 1));
            }
            for (const price of [90, 80, 100, 75]) {
                market.book.placeAsk(Order.ask(trader, price, 1));
            }

            expectSorted(market.book, "bid");
            expectSorted(market.book, "ask");
            expect(ticksOf(market.book, "bid").map((t) => t.price)).toEqual(["10", "20", "40", "50", "70"]);
            expect(ticksOf(market.book, "ask").map((t) => t.price)).toEqual(["75", "80", "90", "100"]);
        });
    });

    describe("failures", () => {
        it("should reject a bid the placer can't collateralize without any effect", () => {
            const user1 = createAccount(market, { quote: 20 });

            expect(() => market.book.placeBid(Order.bid(user1, 3, 10))).toThrow(InsufficientFundsError);
            expect(balancesOf(market.book, user1).quoteUnlocked).toBe("20");
            expect(ticksOf(market.book, "bid")).toEqual([]);
        });

        it("should reject an ask from an account missing from a ledger", () => {
            const stranger = AccountCap.issue();
            market.book.baseLedger.initialize(stranger);

            expect(() => market.book.placeAsk(Order.ask(stranger, 3, 1))).toThrow(AccountNotFoundError);
            expect(() => market.book.placeAsk(Order.ask(stranger, 3, 1))).toThrow("in the QUOTE ledger");
            expect(ticksOf(market.book, "ask")).toEqual([]);
        });

        it("should roll back earlier fills when a later maker can't settle", () => {
            const c = createAccount(market, { base: 5 });
            const a = createAccount(market, { base: 10 });
            const buyer = createAccount(market, { quote: 100 });
            const cheap = Order.ask(c, 2, 1);
            market.book.placeAsk(cheap);
            market.book.placeAsk(Order.ask(a, 3, 2));
            const drained = market.book.baseLedger.withdraw("locked", a, new Decimal(2));

            expect(() => market.book.placeBid(Order.bid(buyer, 3, 3))).toThrow(InvariantViolationError);

            expect(balancesOf(market.book, buyer)).toEqual({
                baseLocked: "0",
                baseUnlocked: "0",
                quoteLocked: "0",
                quoteUnlocked: "100",
            });
            expect(balancesOf(market.book, c)).toEqual({
                baseLocked: "1",
                baseUnlocked: "4",
                quoteLocked: "0",
                quoteUnlocked: "0",
            });
            expect(balancesOf(market.book, a).quoteUnlocked).toBe("0");
            expectDecimalEquals(cheap.quantity, 1);
            expect(ticksOf(market.book, "ask")).toEqual([
                { price: "2", quantities: ["1"] },
                { price: "3", quantities: ["2"] },
            ]);
            expect(ticksOf(market.book, "bid")).toEqual([]);

            market.book.baseLedger.deposit("locked", a, drained);
            expectConserved(market);
        });

        it("should refuse an order routed to the wrong side", () => {
            const user1 = createAccount(market, { quote: 100 });

            expect(() => market.book.placeAsk(Order.bid(user1, 1, 1))).toThrow("placeAsk called with bid order");
            expect(balancesOf(market.book, user1).quoteUnlocked).toBe("100");
        });

        it("should refuse to place the same order twice", () => {
            const user1 = createAccount(market, { quote: 1000 });
            const bid = Order.bid(user1, 3, 10);
            market.book.placeBid(bid);

            expect(bid.placed).toBe(true);
            expect(engineErrorCode(() => market.book.placeBid(bid))).toBe("ALREADY_PLACED");
            expect(balancesOf(market.book, user1)).toEqual({
                baseLocked: "0",
                baseUnlocked: "0",
                quoteLocked: "30",
                quoteUnlocked: "970",
            });
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["10"] }]);
            expectConserved(market);
        });

        it("should refuse to place a filled order again", () => {
            const seller = createAccount(market, { base: 2 });
            const buyer = createAccount(market, { quote: 100 });
            market.book.placeAsk(Order.ask(seller, 3, 2));
            const bid = Order.bid(buyer, 3, 2);
            market.book.placeBid(bid);

            expect(engineErrorCode(() => market.book.place(bid))).toBe("ALREADY_PLACED");
            expect(balancesOf(market.book, buyer)).toEqual({
                baseLocked: "0",
                baseUnlocked: "2",
                quoteLocked: "0",
                quoteUnlocked: "94",
            });
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["0"] }]);
            expectConserved(market);
        });

        it("should allow placing an order again after a rolled back attempt", () => {
            const user1 = createAccount(market, { quote: 20 });
            const bid = Order.bid(user1, 3, 10);

            expect(() => market.book.placeBid(bid)).toThrow(InsufficientFundsError);
            expect(bid.placed).toBe(false);

            fund(market, user1, { quote: 10 });
            market.book.placeBid(bid);

            expect(bid.placed).toBe(true);
            expect(balancesOf(market.book, user1).quoteLocked).toBe("30");
            expect(balancesOf(market.book, user1).quoteUnlocked).toBe("0");
        });

        it("should reject a bid whose collateral exceeds the decimal precision", () => {
            const user1 = createAccount(market, { quote: 100 });
            const bid = Order.bid(user1, "100000000000000000000", "100000000000000000000");

            expect(engineErrorCode(() => market.book.placeBid(bid))).toBe("NOTIONAL_TOO_LARGE");
            expect(bid.placed).toBe(false);
            expect(balancesOf(market.book, user1).quoteUnlocked).toBe("100");
            expect(ticksOf(market.book, "bid")).toEqual([]);
        });
    });

    describe("queries", () => {
        it("should list an account's live orders and aggregate the book", () => {
            const user1 = createAccount(market, { quote: 1000 });
            const user2 = createAccount(market, { base: 500 });
            market.book.place(Order.bid(user1, 3, 10));
            market.book.place(Order.bid(user1, 2, 4));
            market.book.place(Order.ask(user2, 3, 5));
            market.book.place(Order.ask(user2, 9, 1));

            expect(market.book.ordersOf(accountIdOf(user1)).map((o) => [o.price.toString(), o.quantity.toString()])).toEqual([
                ["3", "5"],
                ["2", "4"],
            ]);
            expect(market.book.ordersOf(accountIdOf(user2)).map((o) => o.price.toString())).toEqual(["9"]);

            const snapshot = market.book.snapshot();
            expect(snapshot.pairId).toBe("BASE-QUOTE");
            expect(snapshot.bids.map((l) => [l.price.toString(), l.quantity.toString()])).toEqual([
                ["3", "5"],
                ["2", "4"],
            ]);
            expect(snapshot.asks.map((l) => [l.price.toString(), l.quantity.toString()])).toEqual([["9", "1"]]);
        });

        it("should not change state when queried repeatedly", () => {
            const user1 = createAccount(market, { quote: 1000 });
            market.book.placeBid(Order.bid(user1, 3, 10));
            const id = accountIdOf(user1);

            const first = [market.book.lockedBalance("quote", id).toString(), market.book.ticks("bid").length];
            const second = [market.book.lockedBalance("quote", id).toString(), market.book.ticks("bid").length];

            expect(second).toEqual(first);
            expect(first).toEqual(["30", 1]);
        });
    });

    describe("pruneFilledOrders", () => {
        beforeEach(() => {
            market = createMarket({ pruneFilledOrders: true });
        });

        it("should drop filled makers and not rest a filled taker", () => {
            const user1 = createAccount(market, { quote: 1000 });
            const user2 = createAccount(market, { base: 500 });
            market.book.placeBid(Order.bid(user1, 3, 10));

            const result = market.book.placeAsk(Order.ask(user2, 3, 5));

            expect(result.rested).toBe(false);
            expect(ticksOf(market.book, "ask")).toEqual([]);
            expect(ticksOf(market.book, "bid")).toEqual([{ price: "3", quantities: ["5"] }]);
            expect(balancesOf(market.book, user1)).toEqual({
                baseLocked: "0",
                baseUnlocked: "5",
                quoteLocked: "15",
                quoteUnlocked: "970",
            });
            expectConserved(market);
        });

        it("should remove emptied ticks and keep FIFO of the rest", () => {
            const a = createAccount(market, { base: 10 });
            const b = createAccount(market, { base: 10 });
            const c = createAccount(market, { base: 10 });
            const buyer = createAccount(market, { quote: 100 });
            market.book.placeAsk(Order.ask(a, 2, 1));
            market.book.placeAsk(Order.ask(a, 3, 1));
            const second = Order.ask(b, 3, 2);
            const third = Order.ask(c, 3, 1);
            market.book.placeAsk(second);
            market.book.placeAsk(third);

            market.book.placeBid(Order.bid(buyer, 3, 2));

            expect(ticksOf(market.book, "ask")).toEqual([{ price: "3", quantities: ["2", "1"] }]);
            expect(market.book.ticks("ask")[0].orders.map((o) => o.orderId)).toEqual([second.orderId, third.orderId]);
            expect(ticksOf(market.book, "bid")).toEqual([]);
            expectConserved(market);
        });
    });
});
