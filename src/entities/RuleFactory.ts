import {randomUUID} from 'node:crypto';
import {z} from 'zod';
import {RuleDefinitionError} from "../engine/errors";
import {
    ACTION_TYPES,
    ActionType,
    Rule,
    RuleAction,
    RuleGroup,
    Trigger,
    TRIGGER_FIELDS,
    TRIGGER_OPERATORS,
    TriggerField,
    TriggerGroup,
    TriggerLogic,
    TriggerOperator,
} from "./Rule";

const TriggerSchema = z.object({
    field: z.enum(TRIGGER_FIELDS),
    operator: z.enum(TRIGGER_OPERATORS),
    value: z.string().default(''),
    negated: z.boolean().default(false),
});

type TriggerInput = z.input<typeof TriggerSchema>;

interface TriggerGroupInput {
    logic?: TriggerLogic;
    triggers?: TriggerInput[];
    groups?: TriggerGroupInput[];
}

const TriggerGroupSchema: z.ZodType<TriggerGroup, z.ZodTypeDef, TriggerGroupInput> = z.lazy(() => z.object({
    logic: z.enum(['all', 'any']).default('all'),
    triggers: z.array(TriggerSchema).default([]),
    groups: z.array(TriggerGroupSchema).default([]),
}));

const ActionSchema = z.object({
    type: z.enum(ACTION_TYPES),
    value: z.string().default(''),
});

const RuleSchema = z.object({
    id: z.string().trim().min(1, 'Rule id must be a non-empty string'),
    name: z.string().trim().min(1, 'Rule name must be a non-empty string'),
    priority: z.number().int().default(0),
    isActive: z.boolean().default(true),
    stopProcessing: z.boolean().default(false),
    groupId: z.string().nullable().default(null),
    triggerGroup: TriggerGroupSchema.nullable().default(null),
    actions: z.array(ActionSchema).default([]),
    matchCount: z.number().int().nonnegative().default(0),
    lastMatchedAt: z.coerce.date().nullable().default(null),
    notes: z.string().optional(),
});

const RuleGroupSchema = z.object({
    id: z.string().trim().min(1, 'Group id must be a non-empty string'),
    name: z.string().trim().min(1, 'Group name must be a non-empty string'),
    executionOrder: z.number().int().default(0),
    isActive: z.boolean().default(true),
    notes: z.string().optional(),
});

export interface CreateRuleOptions {
    readonly id?: string;
    readonly priority?: number;
    readonly isActive?: boolean;
    readonly stopProcessing?: boolean;
    readonly groupId?: string | null;
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, what: string): T {
    const result = schema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new RuleDefinitionError(`Invalid ${what}: ${issues}`, {cause: result.error});
    }
    return result.data;
}

export class RuleFactory {
    /**
     * Creates a Rule from a deserialized record. Missing optional fields get their defaults.
     * @throws RuleDefinitionError when the record does not describe a rule
     */
    static create(json: unknown): Rule {
        return parse(RuleSchema, json, 'rule');
    }

    static createRules(rules: unknown): Rule[] {
        if (!Array.isArray(rules)) {
            throw new RuleDefinitionError('Rules must be an array');
        }
        return rules.map(rule => RuleFactory.create(rule));
    }

    static createGroup(json: unknown): RuleGroup {
        return parse(RuleGroupSchema, json, 'rule group');
    }

    static createTriggerGroup(json: unknown): TriggerGroup {
        return parse(TriggerGroupSchema, json, 'trigger group');
    }

    /**
     * Creates a Rule with direct parameters
     */
    static createRule(name: string, triggerGroup: TriggerGroup, actions: readonly RuleAction[], options: CreateRuleOptions = {}): Rule {
        if (!name || name.trim() === '') {
            throw new RuleDefinitionError('Rule name must be a non-empty string');
        }
        return {
            id: options.id ?? randomUUID(),
            name: name.trim(),
            priority: options.priority ?? 0,
            isActive: options.isActive ?? true,
            stopProcessing: options.stopProcessing ?? false,
            groupId: options.groupId ?? null,
            triggerGroup,
            actions,
            matchCount: 0,
            lastMatchedAt: null,
        };
    }

    static trigger(field: TriggerField, operator: TriggerOperator, value = '', negated = false): Trigger {
        return {field, operator, value, negated};
    }

    static all(...children: Array<Trigger | TriggerGroup>): TriggerGroup {
        return RuleFactory.group('all', children);
    }

    static any(...children: Array<Trigger | TriggerGroup>): TriggerGroup {
        return RuleFactory.group('any', children);
    }

    static action(type: ActionType, value = ''): RuleAction {
        return {type, value};
    }

    private static group(logic: TriggerLogic, children: ReadonlyArray<Trigger | TriggerGroup>): TriggerGroup {
        const triggers: Trigger[] = [];
        const groups: TriggerGroup[] = [];
        for (const child of children) {
            if ('logic' in child) {
                groups.push(child);
            } else {
                triggers.push(child);
            }
        }
        return {logic, triggers, groups};
    }
}
