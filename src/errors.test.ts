import { describe, it, expect } from 'vitest';
import * as errors from './errors.js';

describe('Shared Error Factory (src/errors.ts)', () => {
    it('domainError helper constructs the correct shape', () => {
        expect(errors.domainError('Test message')).toEqual({
            isError: true,
            content: [{ type: 'text', text: 'Test message' }],
        });
    });

    it('invalidArgument prefixes the message', () => {
        expect(errors.invalidArgument('bad').content[0].text).toBe('Invalid argument: bad');
    });

    describe('workspace errors', () => {
        it('figureNotLoaded', () => {
            expect(errors.figureNotLoaded('main').content[0].text).toBe("Figure 'main' is not loaded in the workspace.");
        });

        it('figureAlreadyExists', () => {
            expect(errors.figureAlreadyExists('main').content[0].text).toBe(
                "Figure 'main' already exists in the workspace.",
            );
        });

        it('notAnnotatedFigure', () => {
            expect(errors.notAnnotatedFigure('main').content[0].text).toBe("Figure 'main' is not an annotated figure.");
        });

        it('figureFileNotFound', () => {
            expect(errors.figureFileNotFound('a/b.json').content[0].text).toBe('Figure file not found: a/b.json');
        });

        it('invalidFigureFile', () => {
            expect(errors.invalidFigureFile('a.json').content[0].text).toBe(
                'File a.json does not contain a figure with "data" and "layout".',
            );
        });
    });

    describe('layout & geometry errors', () => {
        it('domainIndexTooBig', () => {
            expect(errors.domainIndexTooBig(4, 3).content[0].text).toBe('4 index too big for 3');
        });

        it('invalidGridSize', () => {
            expect(errors.invalidGridSize(0).content[0].text).toBe('Grid must have at least one element per axis, got 0.');
        });

        it('noCoordinates', () => {
            expect(errors.noCoordinates().content[0].text).toBe('No coordinates defined');
        });

        it('noNumericCoordinates', () => {
            expect(errors.noNumericCoordinates('y').content[0].text).toBe('Shape has no numeric y coordinates.');
        });
    });

    it('fromException passes error messages through', () => {
        expect(errors.fromException(new Error('boom')).content[0].text).toBe('boom');
        expect(errors.fromException('plain').content[0].text).toBe('plain');
    });
});
