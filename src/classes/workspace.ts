import { loadFigureFile, saveFigureFile } from '../io/figure-io.js';
import { DrawableClass, type DrawableOptions } from './drawable.js';
import { AnnotatedDrawableClass, type AnnotatedDrawableOptions } from './annotated-drawable.js';
import * as errors from '../errors.js';

/**
 * Options for composing an annotated figure from figures already in the workspace.
 * Tracks are referred to by their workspace names.
 */
export interface ComposeOptions extends Omit<AnnotatedDrawableOptions, 'leftTrack' | 'bottomTrack'> {
    leftTrack?: string;
    bottomTrack?: string;
}

export interface FigureSummary {
    name: string;
    kind: 'figure' | 'annotated';
    traceCount: number;
    title: string | null;
}

/**
 * In-memory figure session singleton.
 * Holds named drawables that tools build up across calls.
 * Not persisted to disk unless a figure is saved explicitly.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** Figures keyed by their workspace name, in creation order. */
    public readonly figures: Map<string, DrawableClass> = new Map();

    private constructor() {
        // Singleton — use WorkspaceClass.instance()
    }

    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Figure Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Registers a drawable under a name. Throws if the name is taken.
     */
    addFigure(name: string, figure: DrawableClass): DrawableClass {
        if (this.figures.has(name)) {
            throw new Error(errors.figureAlreadyExists(name).content[0].text);
        }
        this.figures.set(name, figure);
        return figure;
    }

    createFigure(name: string, options: DrawableOptions = {}): DrawableClass {
        return this.addFigure(name, new DrawableClass(options));
    }

    /**
     * Returns a figure by name. Throws if not loaded.
     */
    getFigure(name: string): DrawableClass {
        const figure = this.figures.get(name);
        if (figure === undefined) {
            throw new Error(errors.figureNotLoaded(name).content[0].text);
        }
        return figure;
    }

    /**
     * Returns an annotated figure by name. Throws if missing or if it is a plain figure.
     */
    getAnnotated(name: string): AnnotatedDrawableClass {
        const figure = this.getFigure(name);
        if (!(figure instanceof AnnotatedDrawableClass)) {
            throw new Error(errors.notAnnotatedFigure(name).content[0].text);
        }
        return figure;
    }

    deleteFigure(name: string): void {
        if (!this.figures.delete(name)) {
            throw new Error(errors.figureNotLoaded(name).content[0].text);
        }
    }

    /**
     * Composes a new annotated figure from a core figure and optional track figures.
     * The composed figure holds references, so later edits to the parts show through.
     */
    composeAnnotated(name: string, coreName: string, options: ComposeOptions = {}): AnnotatedDrawableClass {
        if (this.figures.has(name)) {
            throw new Error(errors.figureAlreadyExists(name).content[0].text);
        }
        const core = this.getFigure(coreName);
        const { leftTrack, bottomTrack, ...rest } = options;
        const annotated = new AnnotatedDrawableClass(core, {
            ...rest,
            leftTrack: leftTrack !== undefined ? this.getFigure(leftTrack) : null,
            bottomTrack: bottomTrack !== undefined ? this.getFigure(bottomTrack) : null,
        });
        this.addFigure(name, annotated);
        return annotated;
    }

    // ------------------------------------------------------------------------
    // Persistence
    // ------------------------------------------------------------------------

    /**
     * Writes a figure's JSON specification to disk.
     */
    async save(name: string, filePath: string): Promise<{ name: string; path: string }> {
        const figure = this.getFigure(name);
        await saveFigureFile(filePath, figure.toJSON());
        return { name, path: filePath };
    }

    /**
     * Reads a figure specification from disk into a new plain figure.
     * Empty placeholder traces are dropped.
     */
    async load(name: string, filePath: string): Promise<DrawableClass> {
        if (this.figures.has(name)) {
            throw new Error(errors.figureAlreadyExists(name).content[0].text);
        }
        const spec = await loadFigureFile(filePath);
        const traces = spec.data.filter((trace) => Object.keys(trace).length > 0);
        return this.addFigure(name, new DrawableClass({ traces, layout: spec.layout }));
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current workspace state for the `workspace info` tool action.
     */
    info(): { figures: FigureSummary[] } {
        const figures: FigureSummary[] = [];
        for (const [name, figure] of this.figures) {
            figures.push({
                name,
                kind: figure instanceof AnnotatedDrawableClass ? 'annotated' : 'figure',
                traceCount: figure.traceCount,
                title: figure.title,
            });
        }
        return { figures };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
