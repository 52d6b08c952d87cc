import {beforeEach, describe, expect, it, vi} from "vitest";
import type {LedgerEntry} from "../../../src/ledger/application/domain/model/LedgerEntry";
import type {LoadLedgerEntriesPort} from "../../../src/ledger/application/port/out/LoadLedgerEntriesPort";
import {PointsSummaryQueryService} from "../../../src/ledger/application/service/PointsSummaryQueryService";
import {createProperties, fixedClock, savedEntry, TODAY} from "../../helpers/fixtures";

describe("PointsSummaryQueryService", () => {
    let storedEntries: LedgerEntry[];
    let mockLoadPort: LoadLedgerEntriesPort;
    let service: PointsSummaryQueryService;

    beforeEach(() => {
        storedEntries = [];
        mockLoadPort = {
            list: vi.fn(async () => storedEntries),
        };
        service = new PointsSummaryQueryService(mockLoadPort, fixedClock, createProperties());
    });

    it("集計値・金額・交換可否をまとめて返す", async () => {
        // Arrange: 昨日 +10、今日 -3 → 残高 7
        storedEntries = [
            savedEntry(1, TODAY.plusDays(-1), 10),
            savedEntry(2, TODAY, -3),
        ];

        // Act
        const summary = await service.getSummary();

        // Assert
        expect(summary.totals.lifetime.getValue()).toBe(10);
        expect(summary.totals.spent.getValue()).toBe(-3);
        expect(summary.totals.balance.getValue()).toBe(7);
        expect(summary.totals.today.getValue()).toBe(-3);
        expect(summary.worth).toEqual({balance: "£0.70", lifetime: "£1.00"});
        expect(summary.affordability.affordable.map((r) => r.name)).toEqual(["Sweets"]);
        expect(summary.affordability.nextReward?.reward.name).toBe("Movie");
        expect(summary.quickActions.map((a) => a.label)).toEqual(["Teeth", "Kindness"]);
    });

    it("空の台帳では何も交換できない", async () => {
        // Act
        const summary = await service.getSummary();

        // Assert
        expect(summary.totals.balance.isZero()).toBe(true);
        expect(summary.affordability.affordable).toEqual([]);
        expect(summary.affordability.nextReward?.reward.name).toBe("Sweets");
        expect(summary.affordability.nextReward?.progress).toBe(0);
    });

    it("履歴は表示順（日付降順 → id 降順）で返す", async () => {
        // Arrange
        storedEntries = [
            savedEntry(1, TODAY.plusDays(-1), 1),
            savedEntry(2, TODAY, 1),
            savedEntry(3, TODAY.plusDays(-1), 1),
        ];

        // Act
        const history = await service.getHistory();

        // Assert
        expect(history.map((e) => e.getId()?.getValue())).toEqual([2, 3, 1]);
    });
});
