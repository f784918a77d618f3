import { describe, it, expect } from 'vitest';
import {
    createRequestGenerator,
    generateRequest,
    nextInt,
    nextRandom,
    MAX_PROCESSING_TIME,
    MIN_PROCESSING_TIME
} from './requestGenerator';
import { RequestMethod } from '../models/WorkItem';

describe('requestGenerator', () => {

    describe('nextRandom', () => {
        it('should be deterministic for a given seed', () => {
            expect(nextRandom(1234)).toEqual(nextRandom(1234));
        });

        it('should stay within [0, 1)', () => {
            let seed = 7;
            for (let i = 0; i < 1000; i++) {
                const draw = nextRandom(seed);
                expect(draw.value).toBeGreaterThanOrEqual(0);
                expect(draw.value).toBeLessThan(1);
                seed = draw.seed;
            }
        });
    });

    describe('nextInt', () => {
        it('should cover both ends of an inclusive range', () => {
            const seen = new Set<number>();
            let seed = 99;
            for (let i = 0; i < 500; i++) {
                const draw = nextInt(seed, 1, 4);
                seen.add(draw.value);
                seed = draw.seed;
            }
            expect([...seen].sort()).toEqual([1, 2, 3, 4]);
        });
    });

    describe('generateRequest', () => {
        it('should return the same request and next seed for the same input', () => {
            const first = generateRequest(555, 1, 0);
            const second = generateRequest(555, 1, 0);
            expect(first).toEqual(second);
            expect(first.seed).not.toBe(555);
        });

        it('should produce fields within their ranges', () => {
            let seed = 2024;
            const methods: string[] = Object.values(RequestMethod);
            for (let id = 1; id <= 300; id++) {
                const result = generateRequest(seed, id, 17);
                const { item } = result;
                seed = result.seed;

                const octets = item.originAddress.split('.').map(Number);
                expect(octets).toHaveLength(4);
                octets.forEach(octet => {
                    expect(octet).toBeGreaterThanOrEqual(1);
                    expect(octet).toBeLessThanOrEqual(254);
                });
                expect(methods).toContain(item.category);
                expect(item.priority).toBeGreaterThanOrEqual(1);
                expect(item.priority).toBeLessThanOrEqual(10);
                expect(item.processingTime).toBeGreaterThanOrEqual(MIN_PROCESSING_TIME);
                expect(item.processingTime).toBeLessThanOrEqual(MAX_PROCESSING_TIME);
                expect(item.remainingTime).toBe(item.processingTime);
                expect(item.arrivalCycle).toBe(17);
                expect(item.id).toBe(id);
            }
        });
    });

    describe('createRequestGenerator', () => {
        it('should hand out sequential ids from the first id', () => {
            const generator = createRequestGenerator(1, 1001);
            expect(generator.next(0).id).toBe(1001);
            expect(generator.next(0).id).toBe(1002);
        });

        it('should replay the same stream for the same seed', () => {
            const a = createRequestGenerator(77);
            const b = createRequestGenerator(77);
            for (let i = 0; i < 20; i++) {
                expect(a.next(i)).toEqual(b.next(i));
                expect(a.chance()).toBe(b.chance());
            }
        });
    });
});
