const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * 暦日（時刻を持たない日付）を表す値オブジェクト
 *
 * 台帳エントリの entryDate は「いつ記録したか」ではなく
 * 「どの日の活動か」を表すため、タイムゾーンや時刻の影響を受けない
 * YYYY-MM-DD の文字列表現で保持する。
 *
 * 文字列がゼロ埋めされた固定長なので、辞書順の比較がそのまま日付順になる。
 */
export class CalendarDate {
    private constructor(private readonly isoDate: string) {}

    /**
     * YYYY-MM-DD 形式の文字列から生成
     *
     * @throws RangeError 形式が不正、または存在しない日付（2024-02-30 など）の場合
     */
    static parse(value: string): CalendarDate {
        const match = ISO_DATE_PATTERN.exec(value);
        if (!match) {
            throw new RangeError(`Invalid calendar date: "${value}" (expected YYYY-MM-DD)`);
        }

        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);

        // Date.UTC は 2024-02-30 を 2024-03-01 に繰り上げるので、往復して一致するかで検証する
        const probe = new Date(Date.UTC(year, month - 1, day));
        if (
            probe.getUTCFullYear() !== year ||
            probe.getUTCMonth() !== month - 1 ||
            probe.getUTCDate() !== day
        ) {
            throw new RangeError(`Invalid calendar date: "${value}"`);
        }

        return new CalendarDate(value);
    }

    /**
     * 形式として正しいかどうか（例外を投げない版）
     */
    static isValid(value: string): boolean {
        try {
            CalendarDate.parse(value);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Date のローカル時刻の年月日から生成
     */
    static fromLocalDate(date: Date): CalendarDate {
        return CalendarDate.fromParts(date.getFullYear(), date.getMonth() + 1, date.getDate());
    }

    /**
     * 指定したタイムゾーンにおける Date の年月日から生成
     *
     * @param timeZone IANA タイムゾーン名（例: "Europe/London"）
     */
    static fromDateInTimeZone(date: Date, timeZone: string): CalendarDate {
        const parts = new Intl.DateTimeFormat('en-US', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
        }).formatToParts(date);

        const pick = (type: Intl.DateTimeFormatPartTypes): number => {
            const part = parts.find((p) => p.type === type);
            if (!part) {
                throw new RangeError(`Cannot resolve ${type} of ${date.toISOString()} in ${timeZone}`);
            }
            return Number(part.value);
        };

        return CalendarDate.fromParts(pick('year'), pick('month'), pick('day'));
    }

    private static fromParts(year: number, month: number, day: number): CalendarDate {
        const pad = (n: number, width: number): string => n.toString().padStart(width, '0');
        return CalendarDate.parse(`${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`);
    }

    /**
     * n 日後（負なら n 日前）の日付
     */
    plusDays(days: number): CalendarDate {
        const [year, month, day] = this.isoDate.split('-').map(Number);
        const shifted = new Date(Date.UTC(year, month - 1, day + days));
        return CalendarDate.parse(shifted.toISOString().slice(0, 10));
    }

    equals(other: CalendarDate): boolean {
        return this.isoDate === other.isoDate;
    }

    /**
     * 比較関数（昇順ソート用）
     * 負: this が前、0: 同日、正: this が後
     */
    compareTo(other: CalendarDate): number {
        if (this.isoDate === other.isoDate) {
            return 0;
        }
        return this.isoDate < other.isoDate ? -1 : 1;
    }

    toString(): string {
        return this.isoDate;
    }

    toJSON(): string {
        return this.isoDate;
    }
}
