import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (prefix only), 'standard' (default, all notations), 'detailed' (rule trace and statistics)",
};

const expressionSchema = {
    type: 'string',
    description: 'Prefix expression with whitespace-delimited tokens, e.g. "+ 1 * 2 3"',
};

const operatorPolicySchema = {
    type: 'string',
    enum: ['strict', 'passthrough'],
    description: "'strict' (default) accepts only + - * /; 'passthrough' treats any non-numeric token as an operator",
};

const allowVariablesSchema = {
    type: 'boolean',
    description: 'Accept identifiers such as x or rate as variable leaves. Default: false.',
};

export const TOOLS: Tool[] = [
    {
        name: 'parse-expression',
        description: `Parse a prefix expression into a binary tree and render it.

**When to use:** You want to check how an expression is structured, or convert it between notations.

**Example:**
  expression: "+ 1 * 2 3"
  → Returns: { prefix: "+ 1 * 2 3", infix: "(1 + (2 * 3))", postfix: "1 2 3 * +", ... }`,
        inputSchema: {
            type: 'object',
            properties: {
                expression: expressionSchema,
                operator_policy: operatorPolicySchema,
                allow_variables: allowVariablesSchema,
            },
            required: ['expression'],
        },
    },
    {
        name: 'simplify-expression',
        description: `Simplify a prefix expression bottom-up.

Rules, tried in order at every node after its children are simplified:
1. x + 0 = x
2. x * 1 = x
3. x * 0 = 0
4. constant folding, e.g. + 1 1 = 2 (disable with fold: false)

**Example:**
  expression: "+ 1 * 0 1"
  → Returns: { prefix: "1", infix: "1", postfix: "1", changed: true }

**Common issues:**
- Division by zero while folding is an error unless skip_folding_errors is true`,
        inputSchema: {
            type: 'object',
            properties: {
                expression: expressionSchema,
                fold: {
                    type: 'boolean',
                    description: 'Apply constant folding. Default: true.',
                },
                skip_folding_errors: {
                    type: 'boolean',
                    description: 'Leave a node unfolded instead of failing on division by zero. Default: false.',
                },
                operator_policy: operatorPolicySchema,
                allow_variables: allowVariablesSchema,
                verbosity: verbositySchema,
            },
            required: ['expression'],
        },
    },
    {
        name: 'render-expression',
        description: `Render a prefix expression in one notation.

**Example:**
  expression: "* + 1 2 3", notation: "infix"
  → Returns: { notation: "infix", output: "((1 + 2) * 3)" }`,
        inputSchema: {
            type: 'object',
            properties: {
                expression: expressionSchema,
                notation: {
                    type: 'string',
                    enum: ['prefix', 'infix', 'postfix', 'tree'],
                    description: "Output notation. 'tree' is an indented multi-line view.",
                },
                operator_policy: operatorPolicySchema,
                allow_variables: allowVariablesSchema,
            },
            required: ['expression', 'notation'],
        },
    },
    {
        name: 'evaluate-expression',
        description: `Compute the numeric value of a prefix expression.

**Example:**
  expression: "* x + 1 2", bindings: { "x": 4 }
  → Returns: { value: 12 }`,
        inputSchema: {
            type: 'object',
            properties: {
                expression: expressionSchema,
                bindings: {
                    type: 'object',
                    additionalProperties: { type: 'number' },
                    description: 'Values for variable leaves. Enables variables when given.',
                },
                operator_policy: operatorPolicySchema,
                allow_variables: allowVariablesSchema,
            },
            required: ['expression'],
        },
    },
    {
        name: 'check-well-formed',
        description: `Check whether prefix expressions are well-formed, with lint warnings.

**When to use:** Before simplifying a batch of expressions, to catch malformed ones early.

**Example:**
  expressions: ["+ 1 2", "+ 1"]
  → Returns: { valid: false, expressionResults: [...] }`,
        inputSchema: {
            type: 'object',
            properties: {
                expressions: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Prefix expressions to check',
                },
                operator_policy: operatorPolicySchema,
                allow_variables: allowVariablesSchema,
            },
            required: ['expressions'],
        },
    },
];
