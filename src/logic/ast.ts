/**
 * Syntax tree for compiled expressions.
 *
 * @packageDocumentation
 */

import type { JsonValue } from '../utils/json.js';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '~';

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export interface LiteralNode {
  readonly type: 'literal';
  readonly value: JsonValue;
}

export interface NameNode {
  readonly type: 'name';
  readonly name: string;
}

export interface AttributeNode {
  readonly type: 'attribute';
  readonly object: ExpressionNode;
  readonly name: string;
}

export interface SubscriptNode {
  readonly type: 'subscript';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface ListNode {
  readonly type: 'list';
  readonly items: readonly ExpressionNode[];
}

export interface ObjectNode {
  readonly type: 'object';
  readonly entries: readonly { readonly key: ExpressionNode; readonly value: ExpressionNode }[];
}

export interface UnaryNode {
  readonly type: 'unary';
  readonly operator: '-' | '+' | 'not';
  readonly operand: ExpressionNode;
}

export interface BinaryNode {
  readonly type: 'binary';
  readonly operator: ArithmeticOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface CompareNode {
  readonly type: 'compare';
  readonly operator: CompareOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface LogicalNode {
  readonly type: 'logical';
  readonly operator: 'and' | 'or';
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/**
 * `value is [not] name`.
 */
export interface TestNode {
  readonly type: 'test';
  readonly operand: ExpressionNode;
  readonly test: string;
  readonly negated: boolean;
}

/**
 * `value | name(args)`.
 */
export interface FilterNode {
  readonly type: 'filter';
  readonly operand: ExpressionNode;
  readonly name: string;
  readonly args: readonly ExpressionNode[];
}

/**
 * `consequent if test else alternate`; the alternate is optional.
 */
export interface ConditionalNode {
  readonly type: 'conditional';
  readonly test: ExpressionNode;
  readonly consequent: ExpressionNode;
  readonly alternate: ExpressionNode | undefined;
}

export type ExpressionNode =
  | LiteralNode
  | NameNode
  | AttributeNode
  | SubscriptNode
  | ListNode
  | ObjectNode
  | UnaryNode
  | BinaryNode
  | CompareNode
  | LogicalNode
  | TestNode
  | FilterNode
  | ConditionalNode;
