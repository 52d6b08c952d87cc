import {readFileSync} from 'node:fs';
import {fileURLToPath} from 'node:url';
import {z} from 'zod';
import {MAX_ENTRY_POINTS, Points} from '../ledger/application/domain/model/Points';
import {RewardCatalog} from '../ledger/application/domain/model/RewardCatalog';
import {PointsBankProperties} from '../ledger/application/domain/service/PointsBankProperties';

/**
 * 既定の設定ファイル（リポジトリ直下の config/points-bank.json）
 */
export const DEFAULT_POINTS_BANK_CONFIG_PATH = fileURLToPath(
    new URL('../../config/points-bank.json', import.meta.url)
);

const PositiveIntegerSchema = z.number().int().positive().max(MAX_ENTRY_POINTS);

/**
 * ご褒美カタログとクイック獲得の設定ファイルのスキーマ
 */
export const PointsBankConfigSchema = z.object({
    defaultPerson: z.string().min(1),
    poundsPerPoint: z.number().nonnegative(),
    rewards: z.array(
        z.object({
            name: z.string().min(1),
            cost: PositiveIntegerSchema,
            notes: z.string().default(''),
        })
    ),
    quickEarn: z.array(
        z.object({
            label: z.string().min(1),
            points: PositiveIntegerSchema,
        })
    ),
});

export type PointsBankConfig = z.infer<typeof PointsBankConfigSchema>;

/**
 * 設定ファイルを読み込んで検証する
 *
 * @throws Error ファイルが読めない、JSONとして不正、またはスキーマに合わない場合
 */
export function readPointsBankConfig(path: string = DEFAULT_POINTS_BANK_CONFIG_PATH): PointsBankConfig {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    const result = PointsBankConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new Error(
            `Invalid points bank config (${path}): ${result.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ')}`
        );
    }
    return result.data;
}

/**
 * 設定値からドメインの PointsBankProperties を組み立てる
 *
 * @param parentPin 保護者用 PIN（環境変数から）
 */
export function toPointsBankProperties(
    config: PointsBankConfig,
    parentPin: string | undefined
): PointsBankProperties {
    const labels = new Set<string>();
    for (const action of config.quickEarn) {
        if (labels.has(action.label)) {
            throw new Error(`Duplicate quick earn label: "${action.label}"`);
        }
        labels.add(action.label);
    }

    return new PointsBankProperties(
        config.defaultPerson,
        config.poundsPerPoint,
        new RewardCatalog(
            config.rewards.map((r) => ({name: r.name, cost: Points.of(r.cost), notes: r.notes}))
        ),
        config.quickEarn.map((a) => ({label: a.label, points: Points.of(a.points)})),
        parentPin
    );
}
