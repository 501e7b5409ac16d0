/**
 * AWK Interpreter
 *
 * Executes the AWK AST against input data.
 *
 * All mutable state for a run lives in one Session: variables, the
 * current record, the input reader, buffered output, the regex cache,
 * range-pattern flags and the call-site table. Records are processed one
 * at a time; the only suspension points are input reads, output writes
 * and foreign calls.
 */

import { AwkError, AwkRuntimeError, AwkTypeError, RuntimeIOError } from '../errors/awk-error.js';
import { logger } from '../logger.js';
import { RandomState, type BuiltinContext, type Reference } from './builtins.js';
import { AwkArray, Binding, Environment, type Frame } from './environment.js';
import { EMPTY_REGISTRY, invokeForeign, type ForeignRegistry } from './foreign.js';
import { formatPrintf } from './format.js';
import { FunctionTable } from './functions.js';
import {
    FileRecordReader, RecordReader, fileSource, streamSource,
    type InputChunk, type InputOperand, type RecordEvent,
} from './input.js';
import { OutputManager, type OutputTarget, type OutputWriter } from './output.js';
import { RecordState } from './record.js';
import { RegexCache } from './regex.js';
import {
    BreakException, ContinueException, ExitException, NextException, ReturnException,
    type ArrayAccessNode, type AssignmentNode, type BinaryNode, type BlockNode,
    type ExprNode, type ForInStmtNode, type ForStmtNode, type FunctionCallNode,
    type FunctionDefNode, type GetlineNode, type InExprNode, type IncrementNode,
    type LValueNode, type OutputRedirect, type ProgramNode, type RuleNode, type StmtNode,
} from './types.js';
import {
    DEFAULT_CONVFMT, UNINIT, bool, compareValues, formatArg, fromInput, num,
    numberToString, str, toBool, toNumber, toStr, type AwkValue,
} from './value.js';

export type InterpreterOptions = {
    stdout: OutputWriter;
    stderr: OutputWriter;
    foreign?: ForeignRegistry;
    signal?: AbortSignal;
    /** Contents of ENVIRON */
    environ?: Record<string, string | undefined>;
    /** Source for `getline < "-"` and `getline < "/dev/stdin"` */
    stdin?: AsyncIterable<InputChunk>;
    outputBufferSize?: number;
};

/**
 * Exit status when a run is cancelled through its AbortSignal
 */
export const ABORTED_EXIT_STATUS = 130;

const MAX_CALL_DEPTH = 10000;

type Session = {
    env: Environment;
    record: RecordState;
    reader: RecordReader;
    output: OutputManager;
    regexes: RegexCache;
    random: RandomState;
    calls: FunctionTable;
    /** Range rules currently inside their range, by rule index */
    rangeStates: Map<number, boolean>;
    /** Readers opened by `getline < file` */
    getlineFiles: Map<string, FileRecordReader>;
    exitCode: number;
};

export class Interpreter {
    private program: ProgramNode;
    private session: Session;
    private context: BuiltinContext;
    private signal?: AbortSignal;
    private stdin?: AsyncIterable<InputChunk>;

    constructor(program: ProgramNode, options: InterpreterOptions) {
        this.program = program;
        this.signal = options.signal;
        this.stdin = options.stdin;

        const env = new Environment();
        const regexes = new RegexCache();
        const record = new RecordState({
            fieldSeparator: () => this.stringVar('FS'),
            outputFieldSeparator: () => this.stringVar('OFS'),
            convfmt: () => this.convfmt(),
            paragraphMode: () => this.stringVar('RS') === '',
        }, regexes);

        this.session = {
            env,
            record,
            reader: this.createReader([]),
            output: new OutputManager(options.stdout, options.stderr, options.outputBufferSize),
            regexes,
            random: new RandomState(),
            calls: new FunctionTable(program.functions, options.foreign ?? EMPTY_REGISTRY),
            rangeStates: new Map(),
            getlineFiles: new Map(),
            exitCode: 0,
        };

        this.defineSpecialVariables(options.environ ?? {});
        this.context = this.createBuiltinContext();
    }

    /**
     * Pre-assign a global before BEGIN; the value behaves like input text
     */
    setVariable(name: string, value: string): void {
        this.session.env.global(name).setScalar(fromInput(value));
    }

    setFieldSeparator(fs: string): void {
        this.session.env.setValue('FS', str(fs));
    }

    async run(inputs: InputOperand[] = []): Promise<number> {
        const session = this.session;
        session.reader = this.createReader(inputs);

        const begin = this.program.rules.filter((r) => r.pattern.type === 'Begin');
        const end = this.program.rules.filter((r) => r.pattern.type === 'End');
        const main = this.program.rules.filter((r) => r.pattern.type !== 'Begin' && r.pattern.type !== 'End');

        try {
            const exited = await this.runPhase(begin, 'BEGIN');

            // A program with only BEGIN actions never reads input
            if (!exited && (main.length > 0 || end.length > 0)) {
                await this.catchExit(() => this.mainLoop(main));
            }

            if (this.aborted()) {
                return ABORTED_EXIT_STATUS;
            }

            await this.runPhase(end, 'END');
            return this.aborted() ? ABORTED_EXIT_STATUS : session.exitCode;
        } finally {
            await this.shutdown();
        }
    }

    // ========================================================================
    // Phases
    // ========================================================================

    /**
     * Run BEGIN or END actions in order. Returns true when one called exit.
     */
    private async runPhase(rules: RuleNode[], phase: 'BEGIN' | 'END'): Promise<boolean> {
        return this.catchExit(async () => {
            for (const rule of rules) {
                if (this.aborted()) throw new ExitException(ABORTED_EXIT_STATUS);
                try {
                    await this.executeAction(rule);
                } catch (e) {
                    if (e instanceof NextException) {
                        throw this.ruleError(new AwkRuntimeError(`next used in ${phase} action`), rule);
                    }
                    throw e;
                }
            }
        });
    }

    private async mainLoop(rules: RuleNode[]): Promise<void> {
        for (;;) {
            if (this.aborted()) throw new ExitException(ABORTED_EXIT_STATUS);

            const event = await this.session.reader.next();
            if (!event) break;

            this.countRecord(event);
            this.session.record.setRecord(event.record);

            try {
                for (const rule of rules) {
                    if (await this.matches(rule)) {
                        await this.executeAction(rule);
                    }
                }
            } catch (e) {
                if (e instanceof NextException) continue;
                throw e;
            }
        }
    }

    private async catchExit(fn: () => Promise<void>): Promise<boolean> {
        try {
            await fn();
            return false;
        } catch (e) {
            if (e instanceof ExitException) {
                this.session.exitCode = e.code;
                return true;
            }
            throw e;
        }
    }

    private async shutdown(): Promise<void> {
        const session = this.session;
        await session.reader.close();
        for (const reader of session.getlineFiles.values()) {
            await reader.close();
        }
        session.getlineFiles.clear();
        await session.output.closeAll();
    }

    private aborted(): boolean {
        return this.signal?.aborted ?? false;
    }

    private async matches(rule: RuleNode): Promise<boolean> {
        try {
            return await this.testPattern(rule);
        } catch (e) {
            throw this.ruleError(e, rule);
        }
    }

    private async testPattern(rule: RuleNode): Promise<boolean> {
        const pattern = rule.pattern;

        switch (pattern.type) {
            case 'Always':
                return true;
            case 'Begin':
            case 'End':
                return false;
            case 'RegexPattern':
                return this.session.regexes.compile(pattern.regex.pattern).test(this.session.record.text);
            case 'ExprPattern':
                return toBool(await this.evaluate(pattern.expr));
            case 'PatternRange': {
                const states = this.session.rangeStates;
                if (!states.get(rule.index)) {
                    if (!toBool(await this.evaluate(pattern.start))) {
                        return false;
                    }
                    // Start and end on the same record is a one-record range
                    if (!toBool(await this.evaluate(pattern.end))) {
                        states.set(rule.index, true);
                    }
                    return true;
                }
                if (toBool(await this.evaluate(pattern.end))) {
                    states.set(rule.index, false);
                }
                return true;
            }
        }
    }

    private async executeAction(rule: RuleNode): Promise<void> {
        try {
            if (rule.action === null) {
                await this.session.output.write(this.session.record.text + this.stringVar('ORS'));
                return;
            }
            await this.executeBlock(rule.action);
        } catch (e) {
            throw this.ruleError(e, rule);
        }
    }

    /**
     * Tag an interpreter error with the rule it escaped from
     */
    private ruleError(e: unknown, rule: RuleNode): unknown {
        if (e instanceof AwkError && e.ruleIndex === undefined) {
            e.ruleIndex = rule.index;
        }
        return e;
    }

    // ========================================================================
    // Statements
    // ========================================================================

    private async executeBlock(block: BlockNode): Promise<void> {
        for (const stmt of block.statements) {
            await this.executeStatement(stmt);
        }
    }

    private async executeStatement(stmt: StmtNode): Promise<void> {
        switch (stmt.type) {
            case 'Block':
                return this.executeBlock(stmt);

            case 'IfStmt':
                if (toBool(await this.evaluate(stmt.condition))) {
                    await this.executeStatement(stmt.consequent);
                } else if (stmt.alternate) {
                    await this.executeStatement(stmt.alternate);
                }
                return;

            case 'WhileStmt':
                while (toBool(await this.evaluate(stmt.condition))) {
                    if (await this.loopIteration(stmt.body) === 'break') break;
                }
                return;

            case 'DoWhileStmt':
                do {
                    if (await this.loopIteration(stmt.body) === 'break') break;
                } while (toBool(await this.evaluate(stmt.condition)));
                return;

            case 'ForStmt':
                return this.executeFor(stmt);

            case 'ForInStmt':
                return this.executeForIn(stmt);

            case 'BreakStmt':
                throw new BreakException();

            case 'ContinueStmt':
                throw new ContinueException();

            case 'NextStmt':
                throw new NextException();

            case 'ExitStmt': {
                const code = stmt.code
                    ? Math.trunc(toNumber(await this.evaluate(stmt.code))) & 0xff
                    : this.session.exitCode;
                throw new ExitException(code);
            }

            case 'ReturnStmt':
                throw new ReturnException(stmt.value ? await this.evaluate(stmt.value) : UNINIT);

            case 'DeleteStmt': {
                const array = this.session.env.lookup(stmt.array).getArray();
                if (stmt.index === null) {
                    array.clear();
                } else {
                    array.delete(await this.subscript(stmt.index));
                }
                return;
            }

            case 'PrintStmt': {
                let text: string;
                if (stmt.args.length === 0) {
                    text = this.session.record.text;
                } else {
                    const ofmt = this.stringVar('OFMT');
                    const convfmt = this.convfmt();
                    const parts: string[] = [];
                    for (const arg of stmt.args) {
                        const value = await this.evaluate(arg);
                        parts.push(value.kind === 'number' ? numberToString(value.num, ofmt) : toStr(value, convfmt));
                    }
                    text = parts.join(this.stringVar('OFS'));
                }
                const target = await this.outputTarget(stmt.output);
                await this.session.output.write(text + this.stringVar('ORS'), target);
                return;
            }

            case 'PrintfStmt': {
                const convfmt = this.convfmt();
                const format = toStr(await this.evaluate(stmt.format), convfmt);
                const args = await this.evaluateAll(stmt.args);
                const target = await this.outputTarget(stmt.output);
                await this.session.output.write(formatPrintf(format, args.map((v) => formatArg(v, convfmt))), target);
                return;
            }

            case 'ExpressionStmt':
                await this.evaluate(stmt.expression);
                return;
        }
    }

    /**
     * Run one loop body; break and continue stop here
     */
    private async loopIteration(body: StmtNode): Promise<'break' | 'continue'> {
        if (this.aborted()) throw new ExitException(ABORTED_EXIT_STATUS);
        try {
            await this.executeStatement(body);
        } catch (e) {
            if (e instanceof BreakException) return 'break';
            if (e instanceof ContinueException) return 'continue';
            throw e;
        }
        return 'continue';
    }

    private async executeFor(stmt: ForStmtNode): Promise<void> {
        if (stmt.init) {
            await this.evaluate(stmt.init);
        }

        while (stmt.condition ? toBool(await this.evaluate(stmt.condition)) : true) {
            if (await this.loopIteration(stmt.body) === 'break') break;
            if (stmt.update) {
                await this.evaluate(stmt.update);
            }
        }
    }

    private async executeForIn(stmt: ForInStmtNode): Promise<void> {
        const env = this.session.env;
        const array = env.lookup(stmt.array).getArray();

        for (const key of array.keys()) {
            // Elements deleted by the body are not visited
            if (!array.has(key)) continue;
            env.lookup(stmt.variable).setScalar(fromInput(key));
            if (await this.loopIteration(stmt.body) === 'break') break;
        }
    }

    private async outputTarget(redirect: OutputRedirect | null): Promise<OutputTarget | null> {
        if (redirect === null) {
            return null;
        }
        const path = toStr(await this.evaluate(redirect.target), this.convfmt());
        return { mode: redirect.type === 'append' ? 'append' : 'truncate', path };
    }

    // ========================================================================
    // Expressions
    // ========================================================================

    private async evaluate(expr: ExprNode): Promise<AwkValue> {
        const session = this.session;

        switch (expr.type) {
            case 'NumberLiteral':
                return num(expr.value);

            case 'StringLiteral':
                return str(expr.value);

            // A bare regex matches against $0
            case 'RegexLiteral':
                return bool(session.regexes.compile(expr.pattern).test(session.record.text));

            case 'Identifier':
                return session.env.lookup(expr.name).getScalar();

            case 'FieldAccess':
                return session.record.getField(toNumber(await this.evaluate(expr.index)));

            case 'ArrayAccess':
                return this.arrayElement(expr);

            case 'Binary':
                return this.evaluateBinary(expr);

            case 'Unary': {
                const operand = await this.evaluate(expr.operand);
                if (expr.operator === '!') {
                    return bool(!toBool(operand));
                }
                return num(expr.operator === '-' ? -toNumber(operand) : toNumber(operand));
            }

            case 'Ternary':
                return toBool(await this.evaluate(expr.condition))
                    ? this.evaluate(expr.consequent)
                    : this.evaluate(expr.alternate);

            case 'Assignment':
                return this.evaluateAssignment(expr);

            case 'Increment':
                return this.evaluateIncrement(expr);

            case 'FunctionCall':
                return this.evaluateCall(expr);

            case 'Getline':
                return this.evaluateGetline(expr);

            case 'InExpr':
                return this.evaluateIn(expr);

            case 'Grouping':
                throw new AwkRuntimeError('expression list used as a value', expr);
        }
    }

    private async evaluateAll(exprs: ExprNode[]): Promise<AwkValue[]> {
        const values: AwkValue[] = [];
        for (const expr of exprs) {
            values.push(await this.evaluate(expr));
        }
        return values;
    }

    private async evaluateBinary(expr: BinaryNode): Promise<AwkValue> {
        const op = expr.operator;

        // Short-circuit operators
        if (op === '&&') {
            return bool(toBool(await this.evaluate(expr.left)) && toBool(await this.evaluate(expr.right)));
        }
        if (op === '||') {
            return bool(toBool(await this.evaluate(expr.left)) || toBool(await this.evaluate(expr.right)));
        }

        if (op === '~' || op === '!~') {
            const text = toStr(await this.evaluate(expr.left), this.convfmt());
            const pattern = expr.right.type === 'RegexLiteral'
                ? expr.right.pattern
                : toStr(await this.evaluate(expr.right), this.convfmt());
            const matched = this.session.regexes.compile(pattern).test(text);
            return bool(op === '~' ? matched : !matched);
        }

        const left = await this.evaluate(expr.left);
        const right = await this.evaluate(expr.right);

        switch (op) {
            case 'concat': {
                const convfmt = this.convfmt();
                return str(toStr(left, convfmt) + toStr(right, convfmt));
            }
            case '<': return bool(compareValues(left, right, this.convfmt()) < 0);
            case '<=': return bool(compareValues(left, right, this.convfmt()) <= 0);
            case '>': return bool(compareValues(left, right, this.convfmt()) > 0);
            case '>=': return bool(compareValues(left, right, this.convfmt()) >= 0);
            case '==': return bool(compareValues(left, right, this.convfmt()) === 0);
            // NaN compares unequal to everything
            case '!=': return bool(compareValues(left, right, this.convfmt()) !== 0);
            default:
                return num(this.arithmetic(op, toNumber(left), toNumber(right), expr));
        }
    }

    private arithmetic(op: string, l: number, r: number, node: ExprNode): number {
        switch (op) {
            case '+': return l + r;
            case '-': return l - r;
            case '*': return l * r;
            case '/':
                if (r === 0) throw new AwkRuntimeError('division by zero', node);
                return l / r;
            case '%':
                if (r === 0) throw new AwkRuntimeError('division by zero in %', node);
                return l % r;
            case '^': return Math.pow(l, r);
            default:
                throw new AwkRuntimeError(`unknown operator ${op}`, node);
        }
    }

    private async evaluateAssignment(expr: AssignmentNode): Promise<AwkValue> {
        const ref = await this.reference(expr.target);
        const value = await this.evaluate(expr.value);

        if (expr.operator === '=') {
            ref.set(value);
            return value;
        }

        const op = expr.operator.slice(0, -1);
        const result = num(this.arithmetic(op, toNumber(ref.get()), toNumber(value), expr));
        ref.set(result);
        return result;
    }

    private async evaluateIncrement(expr: IncrementNode): Promise<AwkValue> {
        const ref = await this.reference(expr.operand);
        const old = toNumber(ref.get());
        const updated = expr.operator === '++' ? old + 1 : old - 1;
        ref.set(num(updated));
        return num(expr.prefix ? updated : old);
    }

    private async arrayElement(expr: ArrayAccessNode): Promise<AwkValue> {
        const key = await this.subscript(expr.indices);
        return this.session.env.lookup(expr.array).getArray().ensure(key);
    }

    private async evaluateIn(expr: InExprNode): Promise<AwkValue> {
        const key = await this.subscript(expr.index);
        return bool(this.session.env.lookup(expr.array).getArray().has(key));
    }

    /**
     * Subscript text: each index in CONVFMT form, joined with SUBSEP
     */
    private async subscript(indices: ExprNode[]): Promise<string> {
        const convfmt = this.convfmt();
        const parts: string[] = [];
        for (const index of indices) {
            parts.push(toStr(await this.evaluate(index), convfmt));
        }
        return parts.length === 1 ? parts[0] : parts.join(this.stringVar('SUBSEP'));
    }

    /**
     * Resolve an lvalue once; later get/set calls reuse its subscripts
     */
    private async reference(target: LValueNode): Promise<Reference> {
        const session = this.session;

        switch (target.type) {
            case 'Identifier': {
                const binding = session.env.lookup(target.name);
                return {
                    get: () => binding.getScalar(),
                    set: (value) => binding.setScalar(value),
                };
            }
            case 'FieldAccess': {
                const index = toNumber(await this.evaluate(target.index));
                // Validate before any assignment happens
                session.record.getField(index);
                return {
                    get: () => session.record.getField(index),
                    set: (value) => session.record.setField(index, value),
                };
            }
            case 'ArrayAccess': {
                const key = await this.subscript(target.indices);
                const array = session.env.lookup(target.array).getArray();
                return {
                    get: () => array.ensure(key),
                    set: (value) => array.set(key, value),
                };
            }
        }
    }

    // ========================================================================
    // Function calls
    // ========================================================================

    private async evaluateCall(call: FunctionCallNode): Promise<AwkValue> {
        const resolved = this.session.calls.resolve(call);

        switch (resolved.kind) {
            case 'builtin': {
                const { def } = resolved;
                if (call.args.length < def.minArgs || call.args.length > def.maxArgs) {
                    throw new AwkTypeError(`${call.name}: wrong number of arguments (${call.args.length})`, call);
                }
                return def.fn(call.args, this.context, call);
            }
            case 'user':
                return this.callUser(resolved.def, call);
            case 'foreign': {
                const args = await this.evaluateAll(call.args);
                return invokeForeign(resolved.fn, args, this.convfmt(), this.signal);
            }
        }
    }

    /**
     * New frame holding only the parameters. Arrays pass by reference;
     * an untyped variable is linked so the callee can make it an array.
     */
    private async callUser(def: FunctionDefNode, call: FunctionCallNode): Promise<AwkValue> {
        const env = this.session.env;

        if (call.args.length > def.params.length) {
            throw new AwkTypeError(
                `function ${def.name} called with ${call.args.length} arguments, accepts ${def.params.length}`,
                call
            );
        }
        if (env.depth >= MAX_CALL_DEPTH) {
            throw new AwkRuntimeError(`function call nesting too deep in ${def.name}`, call);
        }

        const frame: Frame = new Map();
        for (let i = 0; i < def.params.length; i++) {
            const param = def.params[i];
            const arg = call.args[i];

            if (arg === undefined) {
                frame.set(param, new Binding(param));
            } else if (arg.type === 'Identifier') {
                const outer = env.lookup(arg.name);
                if (outer.kind === 'array') {
                    frame.set(param, Binding.array(param, outer.getArray()));
                } else if (outer.kind === 'untyped') {
                    frame.set(param, new Binding(param, outer));
                } else {
                    frame.set(param, Binding.scalar(param, outer.getScalar()));
                }
            } else {
                frame.set(param, Binding.scalar(param, await this.evaluate(arg)));
            }
        }

        env.pushFrame(frame);
        try {
            await this.executeBlock(def.body);
            return UNINIT;
        } catch (e) {
            if (e instanceof ReturnException) return e.value;
            throw e;
        } finally {
            env.popFrame();
        }
    }

    // ========================================================================
    // getline
    // ========================================================================

    private async evaluateGetline(expr: GetlineNode): Promise<AwkValue> {
        const ref = expr.target ? await this.reference(expr.target) : null;

        if (expr.file === null) {
            const event = await this.session.reader.next();
            if (!event) {
                return num(0);
            }
            this.countRecord(event);
            if (ref) {
                ref.set(fromInput(event.record));
            } else {
                this.session.record.setRecord(event.record);
            }
            return num(1);
        }

        const name = toStr(await this.evaluate(expr.file), this.convfmt());
        const reader = this.getlineReader(name);

        let line: string | null;
        try {
            line = await reader.next(this.stringVar('RS'));
        } catch (e) {
            if (e instanceof RuntimeIOError) {
                logger.debug('getline could not read file', { file: name, error: e.message });
                // Forget the reader so the next getline tries to open the file again
                this.session.getlineFiles.delete(name);
                await reader.close();
                return num(-1);
            }
            throw e;
        }

        if (line === null) {
            return num(0);
        }
        if (ref) {
            ref.set(fromInput(line));
        } else {
            this.session.record.setRecord(line);
        }
        return num(1);
    }

    private getlineReader(name: string): FileRecordReader {
        const files = this.session.getlineFiles;
        let reader = files.get(name);
        if (!reader) {
            const isStdin = name === '-' || name === '/dev/stdin';
            const source = isStdin
                ? streamSource(this.stdin ?? emptyStream(), name)
                : fileSource(name);
            reader = new FileRecordReader(source);
            files.set(name, reader);
        }
        return reader;
    }

    /**
     * close(): output file, getline reader, or both
     */
    private async closeStream(name: string): Promise<number> {
        const outputResult = await this.session.output.close(name);

        const reader = this.session.getlineFiles.get(name);
        if (reader) {
            this.session.getlineFiles.delete(name);
            await reader.close();
            return 0;
        }
        return outputResult;
    }

    // ========================================================================
    // Variables
    // ========================================================================

    private defineSpecialVariables(environ: Record<string, string | undefined>): void {
        const { env, record } = this.session;

        env.define(Binding.scalar('FS', str(' ')));
        env.define(Binding.scalar('OFS', str(' ')));
        env.define(Binding.scalar('ORS', str('\n')));
        env.define(Binding.scalar('RS', str('\n')));
        env.define(Binding.scalar('NR', num(0)));
        env.define(Binding.scalar('FNR', num(0)));
        env.define(Binding.scalar('FILENAME', str('')));
        env.define(Binding.scalar('SUBSEP', str('\x1c')));
        env.define(Binding.scalar('RSTART', num(0)));
        env.define(Binding.scalar('RLENGTH', num(-1)));
        env.define(Binding.scalar('CONVFMT', str(DEFAULT_CONVFMT)));
        env.define(Binding.scalar('OFMT', str(DEFAULT_CONVFMT)));

        // NF reads and writes go straight to the record
        env.define(Binding.scalar('NF', num(0), {
            get: () => num(record.nf),
            set: (value) => record.setNF(toNumber(value)),
        }));

        const environArray = new AwkArray();
        for (const [key, value] of Object.entries(environ)) {
            if (value !== undefined) {
                environArray.set(key, fromInput(value));
            }
        }
        env.define(Binding.array('ENVIRON', environArray));
    }

    private countRecord(event: RecordEvent): void {
        const env = this.session.env;
        env.setValue('NR', num(toNumber(env.getValue('NR')) + 1));
        if (event.newSource) {
            env.setValue('FNR', num(1));
            env.setValue('FILENAME', str(event.filename));
        } else {
            env.setValue('FNR', num(toNumber(env.getValue('FNR')) + 1));
        }
    }

    private stringVar(name: string): string {
        return toStr(this.session.env.getValue(name), this.convfmt());
    }

    private convfmt(): string {
        return toStr(this.session.env.getValue('CONVFMT'), DEFAULT_CONVFMT);
    }

    private createReader(inputs: InputOperand[]): RecordReader {
        return new RecordReader(inputs, {
            recordSeparator: () => this.stringVar('RS'),
            assign: (name, value) => this.setVariable(name, value),
        });
    }

    private arrayArgument(expr: ExprNode, fnName: string): AwkArray {
        if (expr.type !== 'Identifier') {
            throw new AwkTypeError(`${fnName}: argument is not an array`, expr);
        }
        const binding = this.session.env.lookup(expr.name);
        if (binding.kind === 'scalar') {
            throw new AwkTypeError(`${fnName}: ${expr.name} is not an array`, expr);
        }
        return binding.getArray();
    }

    private createBuiltinContext(): BuiltinContext {
        const session = this.session;
        return {
            record: session.record,
            regexes: session.regexes,
            random: session.random,
            evaluate: (expr) => this.evaluate(expr),
            reference: (target) => this.reference(target),
            array: (expr, fnName) => this.arrayArgument(expr, fnName),
            isArray: (expr) => expr.type === 'Identifier' && session.env.lookup(expr.name).kind === 'array',
            getVar: (name) => session.env.getValue(name),
            setVar: (name, value) => session.env.setValue(name, value),
            convfmt: () => this.convfmt(),
            close: (name) => this.closeStream(name),
            flush: (name) => session.output.flush(name),
        };
    }
}

async function* emptyStream(): AsyncIterable<InputChunk> {
    // No standard input configured
}
