import type {CalendarDate} from './CalendarDate';
import type {Points} from './Points';

/**
 * 台帳エントリID（値オブジェクト）
 *
 * ストアが挿入時に採番する。単調増加で、削除後も再利用されない。
 */
export class LedgerEntryId {
    constructor(private readonly value: number) {
        if (!Number.isSafeInteger(value) || value <= 0) {
            throw new RangeError(`LedgerEntryId must be a positive integer, got ${String(value)}`);
        }
    }

    getValue(): number {
        return this.value;
    }

    equals(other: LedgerEntryId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value.toString();
    }
}

/**
 * 追記専用の台帳の1行
 *
 * 【不変条件】
 * - 作成後は変更されない（更新操作は存在しない）
 * - 訂正は相殺する新しいエントリを追加して行う
 * - 削除は物理削除のみ（ストアの deleteById）
 *
 * person / activity / notes の内容は検証しない。
 * 空の activity や 0 ポイントの拒否は呼び出し側（Web層）の方針。
 */
export class LedgerEntry {
    private constructor(
        private readonly id: LedgerEntryId | null,
        private readonly entryDate: CalendarDate,
        private readonly person: string,
        private readonly activity: string,
        private readonly points: Points,
        private readonly notes: string
    ) {}

    /**
     * IDなしで生成（追記前）
     */
    static withoutId(
        entryDate: CalendarDate,
        person: string,
        activity: string,
        points: Points,
        notes = ''
    ): LedgerEntry {
        return new LedgerEntry(null, entryDate, person, activity, points, notes);
    }

    /**
     * IDありで生成（ストアからの再構成時）
     */
    static withId(
        id: LedgerEntryId,
        entryDate: CalendarDate,
        person: string,
        activity: string,
        points: Points,
        notes = ''
    ): LedgerEntry {
        return new LedgerEntry(id, entryDate, person, activity, points, notes);
    }

    getId(): LedgerEntryId | null {
        return this.id;
    }

    getEntryDate(): CalendarDate {
        return this.entryDate;
    }

    getPerson(): string {
        return this.person;
    }

    getActivity(): string {
        return this.activity;
    }

    getPoints(): Points {
        return this.points;
    }

    getNotes(): string {
        return this.notes;
    }

    isEarn(): boolean {
        return this.points.isPositive();
    }

    isSpend(): boolean {
        return this.points.isNegative();
    }

    isDatedOn(date: CalendarDate): boolean {
        return this.entryDate.equals(date);
    }
}

/**
 * 表示順の比較関数: entryDate 降順 → id 降順
 *
 * IDのないエントリ（未保存）は同日の中で最も新しいものとして扱う。
 */
export function compareLedgerOrder(a: LedgerEntry, b: LedgerEntry): number {
    const byDate = b.getEntryDate().compareTo(a.getEntryDate());
    if (byDate !== 0) {
        return byDate;
    }
    const aId = a.getId()?.getValue() ?? Number.POSITIVE_INFINITY;
    const bId = b.getId()?.getValue() ?? Number.POSITIVE_INFINITY;
    if (aId === bId) {
        return 0;
    }
    return bId > aId ? 1 : -1;
}
