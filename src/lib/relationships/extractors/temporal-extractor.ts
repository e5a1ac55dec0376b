/**
 * TemporalCorrelationExtractor - Documents issued close together
 *
 * Confidence falls linearly with the calendar-day distance between the two
 * primary dates: 1.0 on the same day, 0.5 at half the window, nothing past it.
 */

import { differenceInCalendarDays, formatISO } from 'date-fns';
import { primaryDate, type Document } from '@/lib/documents';
import { canonicalDocuments } from '../canonical';
import { DetectionMethod, type Evidence } from '../types';
import type { EvidenceExtractor, ExtractionContext } from './types';

export function temporalConfidence(days: number, windowDays: number): number {
    if (days > windowDays) return 0;
    return 1 - days / windowDays;
}

export class TemporalCorrelationExtractor implements EvidenceExtractor {
    readonly method = DetectionMethod.TEMPORAL_CORRELATION;

    extract(a: Document, b: Document, { config }: ExtractionContext): Evidence[] {
        const { dateFields, windowDays } = config.temporal;
        const [source, target] = canonicalDocuments(a, b);

        const dateA = primaryDate(source, dateFields);
        if (!dateA) return [];
        const dateB = primaryDate(target, dateFields);
        if (!dateB) return [];

        const days = Math.abs(differenceInCalendarDays(dateA, dateB));
        if (days > windowDays) return [];

        return [{
            sourceId: source.id,
            targetId: target.id,
            method: this.method,
            confidence: temporalConfidence(days, windowDays),
            detail: `Dated ${days} day${days === 1 ? '' : 's'} apart ` +
                `(${formatISO(dateA, { representation: 'date' })} / ${formatISO(dateB, { representation: 'date' })})`
        }];
    }
}
