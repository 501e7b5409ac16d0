/**
 * AWK Environment
 *
 * Variable bindings for one run: globals, function frames, and
 * associative arrays. A binding starts untyped and becomes a scalar or
 * an array on first use; mixing the two is a NameError.
 */

import { NameError } from '../errors/awk-error.js';
import { UNINIT, type AwkValue } from './value.js';

/**
 * Associative array keyed by string subscripts.
 *
 * ensure() is the single access path for reads and writes: looking up a
 * missing subscript creates it. has() checks membership without creating.
 */
export class AwkArray {
    private entries = new Map<string, AwkValue>();

    ensure(key: string): AwkValue {
        let value = this.entries.get(key);
        if (value === undefined) {
            value = UNINIT;
            this.entries.set(key, value);
        }
        return value;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    set(key: string, value: AwkValue): void {
        this.entries.set(key, value);
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    /**
     * Snapshot of the subscripts; safe to iterate while deleting
     */
    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    values(): AwkValue[] {
        return Array.from(this.entries.values());
    }

    get size(): number {
        return this.entries.size;
    }
}

/**
 * Read/write hooks for built-in variables backed by interpreter state
 */
export type ScalarHooks = {
    get?: () => AwkValue;
    set?: (value: AwkValue) => void;
};

type BindingState =
    | { kind: 'untyped' }
    | { kind: 'scalar'; value: AwkValue }
    | { kind: 'array'; array: AwkArray };

export class Binding {
    private state: BindingState = { kind: 'untyped' };

    /**
     * @param origin - caller binding an untyped argument came from; if this
     *   binding becomes an array, so does the origin
     */
    constructor(
        public readonly name: string,
        private readonly origin: Binding | null = null,
        private readonly hooks: ScalarHooks | null = null
    ) {}

    static scalar(name: string, value: AwkValue, hooks?: ScalarHooks): Binding {
        const binding = new Binding(name, null, hooks ?? null);
        binding.state = { kind: 'scalar', value };
        return binding;
    }

    static array(name: string, array: AwkArray = new AwkArray()): Binding {
        const binding = new Binding(name);
        binding.state = { kind: 'array', array };
        return binding;
    }

    get kind(): BindingState['kind'] {
        return this.state.kind;
    }

    getScalar(): AwkValue {
        if (this.hooks?.get) {
            return this.hooks.get();
        }

        switch (this.state.kind) {
            case 'array':
                throw new NameError(`attempt to use array ${this.name} in a scalar context`, this.name);
            case 'scalar':
                return this.state.value;
            case 'untyped':
                return UNINIT;
        }
    }

    setScalar(value: AwkValue): void {
        if (this.state.kind === 'array') {
            throw new NameError(`attempt to use array ${this.name} in a scalar context`, this.name);
        }
        this.state = { kind: 'scalar', value };
        this.hooks?.set?.(value);
    }

    getArray(): AwkArray {
        switch (this.state.kind) {
            case 'scalar':
                throw new NameError(`attempt to use scalar ${this.name} as an array`, this.name);
            case 'array':
                return this.state.array;
            case 'untyped': {
                const array = this.origin && this.origin.kind !== 'scalar'
                    ? this.origin.getArray()
                    : new AwkArray();
                this.state = { kind: 'array', array };
                return array;
            }
        }
    }
}

export type Frame = Map<string, Binding>;

export class Environment {
    private globals = new Map<string, Binding>();
    private frames: Frame[] = [];

    /**
     * Resolve a name: the innermost function frame first, then globals.
     * Unknown globals are created untyped.
     */
    lookup(name: string): Binding {
        const frame = this.frames.length > 0 ? this.frames[this.frames.length - 1] : null;
        const local = frame?.get(name);
        if (local) return local;
        return this.global(name);
    }

    global(name: string): Binding {
        let binding = this.globals.get(name);
        if (!binding) {
            binding = new Binding(name);
            this.globals.set(name, binding);
        }
        return binding;
    }

    define(binding: Binding): void {
        this.globals.set(binding.name, binding);
    }

    getValue(name: string): AwkValue {
        return this.global(name).getScalar();
    }

    setValue(name: string, value: AwkValue): void {
        this.global(name).setScalar(value);
    }

    pushFrame(frame: Frame): void {
        this.frames.push(frame);
    }

    popFrame(): void {
        this.frames.pop();
    }

    get depth(): number {
        return this.frames.length;
    }
}
