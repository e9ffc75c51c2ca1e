import { DateTime } from 'luxon';

import { getTodayByUtcOffset } from '../common/getTodayByUtcOffset';

export class GeneralNote {
    readonly text: string;
    readonly createdAt: DateTime;
    private readonly _tags: string[];

    constructor(text: string, tags: string[] = [], createdAt: DateTime = getTodayByUtcOffset()) {
        this.text = text.trim();
        this._tags = [...tags];
        this.createdAt = createdAt;
    }

    get tags(): readonly string[] {
        return this._tags;
    }

    addTags(tags: string[]): void {
        this._tags.push(...tags);
    }

    // 2026-01-05   [work, car]   text
    toString(): string {
        const tags = this._tags.length >= 1 ? this._tags.join(', ') : '—';
        return `${this.createdAt.toISODate()}   [${tags}]   ${this.text}`;
    }
}
