import {CalendarDate} from "../../src/ledger/application/domain/model/CalendarDate";
import {LedgerEntry, LedgerEntryId} from "../../src/ledger/application/domain/model/LedgerEntry";
import {Points} from "../../src/ledger/application/domain/model/Points";
import {RewardCatalog} from "../../src/ledger/application/domain/model/RewardCatalog";
import {PointsBankProperties} from "../../src/ledger/application/domain/service/PointsBankProperties";
import type {Clock} from "../../src/ledger/application/port/out/Clock";

/**
 * テスト用の共通データ
 */

export const TODAY = CalendarDate.parse("2024-05-10");

export const fixedClock: Clock = {
    today: () => TODAY,
};

export function createProperties(parentPin?: string): PointsBankProperties {
    return new PointsBankProperties(
        "Child",
        0.1,
        new RewardCatalog([
            {name: "Sweets", cost: Points.of(5), notes: "Pick one sweet"},
            {name: "Movie", cost: Points.of(10), notes: "You choose the film"},
        ]),
        [
            {label: "Teeth", points: Points.of(3)},
            {label: "Kindness", points: Points.of(5)},
        ],
        parentPin
    );
}

export function savedEntry(id: number, date: CalendarDate, points: number, activity = "activity"): LedgerEntry {
    return LedgerEntry.withId(new LedgerEntryId(id), date, "Child", activity, Points.of(points));
}
