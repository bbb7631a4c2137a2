import {
    addTag,
    appendMarker,
    markDeleted,
    parseTags,
    readMarker,
    readTransferDestination,
    removeTag,
    writeTransferDestination,
} from './notes';

describe('notes encoding', () => {
    describe('tags', () => {
        it('should parse comma separated tags', () => {
            expect(parseTags(null)).toEqual([]);
            expect(parseTags('travel,  work ,,food')).toEqual(['travel', 'work', 'food']);
        });

        it('should add a tag only once', () => {
            expect(addTag(null, 'travel')).toBe('travel');
            expect(addTag('travel', 'work')).toBe('travel, work');
            expect(addTag('travel,work', 'work')).toBe('travel,work');
        });

        it('should remove a tag and return null when none are left', () => {
            expect(removeTag('travel, work', 'travel')).toBe('work');
            expect(removeTag('travel', 'travel')).toBeNull();
            expect(removeTag('travel', 'food')).toBe('travel');
        });
    });

    describe('markers', () => {
        it('should append markers with a pipe separator', () => {
            expect(appendMarker(null, 'Ref: A1')).toBe('Ref: A1');
            expect(appendMarker('', 'Ref: A1')).toBe('Ref: A1');
            expect(appendMarker('lunch', 'Ref: A1')).toBe('lunch | Ref: A1');
        });

        it('should read the last marker with a prefix', () => {
            expect(readMarker('lunch | Ref: A1 | Ref: B2', 'Ref: ')).toBe('B2');
            expect(readMarker('lunch', 'Ref: ')).toBeNull();
            expect(readMarker(null, 'Ref: ')).toBeNull();
        });

        it('should not read tags added after a marker as part of its value', () => {
            const notes = addTag('External ID: abc', 'work');
            expect(notes).toBe('External ID: abc, work');
            expect(readMarker(notes, 'External ID: ')).toBe('abc');
            expect(readTransferDestination(addTag('Transfer to: Savings (NL00TEST0000000003)', 'work'))).toBe('Savings');
        });

        it('should prefix deleted transactions', () => {
            expect(markDeleted(null)).toBe('[DELETED by rule]');
            expect(markDeleted('lunch')).toBe('[DELETED by rule] lunch');
        });
    });

    describe('transfer destination', () => {
        it('should write and read back the destination account', () => {
            const notes = writeTransferDestination('lunch', 'Savings', 'NL00TEST0000000003');
            expect(notes).toBe('lunch | Transfer to: Savings (NL00TEST0000000003)');
            expect(readTransferDestination(notes)).toBe('Savings');
        });

        it('should replace an earlier destination', () => {
            const first = writeTransferDestination(null, 'Savings', 'NL00TEST0000000003');
            const second = writeTransferDestination(`${first} | Ref: A1`, 'Joint', 'NL00TEST0000000004');
            expect(second).toBe('Ref: A1 | Transfer to: Joint (NL00TEST0000000004)');
            expect(readTransferDestination(second)).toBe('Joint');
        });
    });
});
