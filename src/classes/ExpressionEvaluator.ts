/**
 * ExpressionEvaluator class for evaluating Claro expressions
 */

import { isDict, isList, isTruthy, getValueType, valuesEqual, type Value, type ValueMap } from '../utils';
import { parseExpressionText } from '../parsers/ExpressionParser';
import { ExpressionError } from './exceptions';
import type { BuiltinHandler, VariableEnvironment } from '../types/Environment.type';
import type { Expression, BinaryExpression, BinaryOperator, UnaryExpression, CallExpression } from '../types/Ast.type';

export const DEFAULT_PARSE_CACHE_SIZE = 500;

export class ExpressionEvaluator {
    private builtins: Map<string, BuiltinHandler>;
    // Parsed trees per source text, oldest evicted first once cacheSize is reached
    private parsed: Map<string, Expression> = new Map();
    private cacheSize: number;

    constructor(builtins: Map<string, BuiltinHandler>, cacheSize: number = DEFAULT_PARSE_CACHE_SIZE) {
        this.builtins = builtins;
        this.cacheSize = cacheSize;
    }

    /**
     * Evaluate one expression against a variable environment.
     * Any failure (syntax, undefined name, type error in an operator or builtin) is raised as ExpressionError.
     */
    evaluate(expr: string, env: VariableEnvironment): Value {
        const source = expr.trim();
        try {
            return this.evaluateNode(this.parse(source), env);
        } catch (error) {
            if (error instanceof ExpressionError) {
                throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new ExpressionError(source, reason);
        }
    }

    /**
     * Parse without evaluating, so callers can validate syntax up front
     */
    parse(source: string): Expression {
        const cached = this.parsed.get(source);
        if (cached) {
            return cached;
        }
        const expr = parseExpressionText(source);
        if (this.parsed.size >= this.cacheSize) {
            const oldest = this.parsed.keys().next();
            if (!oldest.done) {
                this.parsed.delete(oldest.value);
            }
        }
        this.parsed.set(source, expr);
        return expr;
    }

    private evaluateNode(expr: Expression, env: VariableEnvironment): Value {
        switch (expr.type) {
            case 'literal':
                return expr.value;
            case 'identifier': {
                const value = env.get(expr.name);
                if (value === undefined) {
                    throw new Error(`Undefined variable '${expr.name}'`);
                }
                return value;
            }
            case 'list':
                return expr.elements.map(element => this.evaluateNode(element, env));
            case 'dict': {
                const result: ValueMap = {};
                for (const entry of expr.entries) {
                    const key = this.evaluateNode(entry.key, env);
                    if (typeof key !== 'string' && typeof key !== 'number') {
                        throw new Error(`Dict keys must be strings or numbers, got ${getValueType(key)}`);
                    }
                    // defineProperty keeps keys such as "__proto__" as ordinary entries
                    Object.defineProperty(result, String(key), {
                        value: this.evaluateNode(entry.value, env),
                        enumerable: true,
                        writable: true,
                        configurable: true
                    });
                }
                return result;
            }
            case 'logical': {
                const left = this.evaluateNode(expr.left, env);
                if (expr.operator === 'and') {
                    return isTruthy(left) ? this.evaluateNode(expr.right, env) : left;
                }
                return isTruthy(left) ? left : this.evaluateNode(expr.right, env);
            }
            case 'binary':
                return this.evaluateBinary(expr, env);
            case 'unary':
                return this.evaluateUnary(expr, env);
            case 'index':
                return this.evaluateIndex(this.evaluateNode(expr.object, env), this.evaluateNode(expr.index, env));
            case 'member': {
                const object = this.evaluateNode(expr.object, env);
                if (!isDict(object)) {
                    throw new Error(`Cannot read field '${expr.property}' of ${getValueType(object)}`);
                }
                if (!Object.prototype.hasOwnProperty.call(object, expr.property)) {
                    throw new Error(`Key '${expr.property}' not found`);
                }
                return object[expr.property];
            }
            case 'call':
                return this.evaluateCall(expr, env);
        }
    }

    private evaluateBinary(expr: BinaryExpression, env: VariableEnvironment): Value {
        const left = this.evaluateNode(expr.left, env);
        const right = this.evaluateNode(expr.right, env);
        const op = expr.operator;

        switch (op) {
            case '==':
                return valuesEqual(left, right);
            case '!=':
                return !valuesEqual(left, right);
            case 'in':
                return this.contains(right, left);
            case 'not in':
                return !this.contains(right, left);
            case '<':
            case '<=':
            case '>':
            case '>=':
                return this.compare(op, left, right);
            case '+':
                if (typeof left === 'number' && typeof right === 'number') return left + right;
                if (typeof left === 'string' && typeof right === 'string') return left + right;
                if (isList(left) && isList(right)) return [...left, ...right];
                throw this.operandError(op, left, right);
            case '*':
                if (typeof left === 'number' && typeof right === 'number') return left * right;
                if (typeof right === 'number' && (typeof left === 'string' || isList(left))) return this.repeat(left, right);
                if (typeof left === 'number' && (typeof right === 'string' || isList(right))) return this.repeat(right, left);
                throw this.operandError(op, left, right);
            default:
                return this.arithmetic(op, left, right);
        }
    }

    private arithmetic(op: BinaryOperator, left: Value, right: Value): number {
        if (typeof left !== 'number' || typeof right !== 'number') {
            throw this.operandError(op, left, right);
        }
        if (right === 0 && (op === '/' || op === '//' || op === '%')) {
            throw new Error(op === '%' ? 'Modulo by zero' : 'Division by zero');
        }
        switch (op) {
            case '-':
                return left - right;
            case '/':
                return left / right;
            case '//':
                return Math.floor(left / right);
            case '%':
                return ((left % right) + right) % right;
            case '**':
                return Math.pow(left, right);
            default:
                throw new Error(`Unknown operator '${op}'`);
        }
    }

    private evaluateUnary(expr: UnaryExpression, env: VariableEnvironment): Value {
        const arg = this.evaluateNode(expr.argument, env);

        switch (expr.operator) {
            case 'not':
                return !isTruthy(arg);
            case '-':
            case '+':
                if (typeof arg !== 'number') {
                    throw new Error(`Unary '${expr.operator}' needs a number, got ${getValueType(arg)}`);
                }
                return expr.operator === '-' ? -arg : arg;
        }
    }

    private evaluateIndex(object: Value, index: Value): Value {
        if (typeof object === 'string' || isList(object)) {
            if (typeof index !== 'number' || !Number.isInteger(index)) {
                throw new Error(`Index must be an integer, got ${getValueType(index)}`);
            }
            const position = index < 0 ? object.length + index : index;
            if (position < 0 || position >= object.length) {
                throw new Error(`Index ${index} out of range for length ${object.length}`);
            }
            return object[position];
        }
        if (isDict(object)) {
            const key = typeof index === 'number' ? String(index) : index;
            if (typeof key !== 'string') {
                throw new Error(`Dict key must be a string, got ${getValueType(index)}`);
            }
            if (!Object.prototype.hasOwnProperty.call(object, key)) {
                throw new Error(`Key '${key}' not found`);
            }
            return object[key];
        }
        throw new Error(`Cannot index into ${getValueType(object)}`);
    }

    private evaluateCall(expr: CallExpression, env: VariableEnvironment): Value {
        const handler = this.builtins.get(expr.callee);
        if (!handler) {
            throw new Error(`Unknown function '${expr.callee}'`);
        }
        const args = expr.args.map(arg => this.evaluateNode(arg, env));
        return handler(args);
    }

    private contains(container: Value, item: Value): boolean {
        if (typeof container === 'string') {
            if (typeof item !== 'string') {
                throw new Error(`'in <string>' needs a string on the left, got ${getValueType(item)}`);
            }
            return container.includes(item);
        }
        if (isList(container)) {
            return container.some(element => valuesEqual(element, item));
        }
        if (isDict(container)) {
            return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
        }
        throw new Error(`'in' is not supported for ${getValueType(container)}`);
    }

    private compare(op: '<' | '<=' | '>' | '>=', left: Value, right: Value): boolean {
        let order: number;
        if ((typeof left === 'number' && typeof right === 'number') || (typeof left === 'string' && typeof right === 'string')) {
            order = left < right ? -1 : left > right ? 1 : 0;
        } else {
            throw this.operandError(op, left, right);
        }
        switch (op) {
            case '<': return order < 0;
            case '<=': return order <= 0;
            case '>': return order > 0;
            case '>=': return order >= 0;
        }
    }

    private repeat(value: string | Value[], times: number): Value {
        if (!Number.isInteger(times)) {
            throw new Error(`Can only repeat by an integer, got ${times}`);
        }
        const count = Math.max(0, times);
        if (typeof value === 'string') {
            return value.repeat(count);
        }
        const result: Value[] = [];
        for (let i = 0; i < count; i++) {
            result.push(...value);
        }
        return result;
    }

    private operandError(op: string, left: Value, right: Value): Error {
        return new Error(`Unsupported operand types for ${op}: ${getValueType(left)} and ${getValueType(right)}`);
    }
}
