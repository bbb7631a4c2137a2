import {RuleDefinitionError} from '@/engine/errors';
import {describeRule, ungroupRules} from './Rule';
import {RuleFactory} from './RuleFactory';

describe('RuleFactory', () => {
    describe('create', () => {
        it('should create a Rule from a stored record with defaults', () => {
            const rule = RuleFactory.create({
                id: 'r1',
                name: '  Netflix  ',
                triggerGroup: {triggers: [{field: 'description', operator: 'contains', value: 'netflix'}]},
                actions: [{type: 'setCategory', value: 'Subscriptions'}],
            });

            expect(rule).toEqual({
                id: 'r1',
                name: 'Netflix',
                priority: 0,
                isActive: true,
                stopProcessing: false,
                groupId: null,
                triggerGroup: {
                    logic: 'all',
                    triggers: [{field: 'description', operator: 'contains', value: 'netflix', negated: false}],
                    groups: [],
                },
                actions: [{type: 'setCategory', value: 'Subscriptions'}],
                matchCount: 0,
                lastMatchedAt: null,
            });
        });

        it('should parse nested groups and timestamps', () => {
            const rule = RuleFactory.create({
                id: 'r2',
                name: 'Large expenses',
                lastMatchedAt: '2024-03-15T10:00:00.000Z',
                triggerGroup: {
                    logic: 'any',
                    groups: [{logic: 'all', triggers: [{field: 'amount', operator: 'greaterThan', value: '1000', negated: true}]}],
                },
            });

            expect(rule.lastMatchedAt).toEqual(new Date('2024-03-15T10:00:00.000Z'));
            expect(rule.triggerGroup?.groups[0].triggers[0]).toEqual({field: 'amount', operator: 'greaterThan', value: '1000', negated: true});
        });

        it('should keep a missing trigger group as null', () => {
            expect(RuleFactory.create({id: 'r3', name: 'Empty'}).triggerGroup).toBeNull();
        });

        it('should report every problem of an invalid record', () => {
            const invalid = () => RuleFactory.create({
                id: 'r4',
                name: '',
                actions: [{type: 'launchRocket'}],
            });

            expect(invalid).toThrow(RuleDefinitionError);
            expect(invalid).toThrow(/^Invalid rule: name: Rule name must be a non-empty string; actions\.0\.type: /);
        });

        it('should reject unknown operators', () => {
            expect(() => RuleFactory.createTriggerGroup({triggers: [{field: 'amount', operator: 'around'}]}))
                .toThrow(/^Invalid trigger group: triggers\.0\.operator: /);
        });

        it('should throw for null or non-object input', () => {
            expect(() => RuleFactory.create(null)).toThrow('Invalid rule: (root): Expected object, received null');
            expect(() => RuleFactory.create('rule')).toThrow(RuleDefinitionError);
        });
    });

    describe('createRules', () => {
        it('should create rules from an array', () => {
            const rules = RuleFactory.createRules([{id: 'a', name: 'A'}, {id: 'b', name: 'B', priority: 3}]);
            expect(rules.map(rule => [rule.id, rule.priority])).toEqual([['a', 0], ['b', 3]]);
        });

        it('should throw when not given an array', () => {
            expect(() => RuleFactory.createRules({id: 'a'})).toThrow('Rules must be an array');
        });
    });

    describe('createGroup', () => {
        it('should default execution order and activity', () => {
            expect(RuleFactory.createGroup({id: 'g1', name: 'Groceries'})).toEqual({
                id: 'g1',
                name: 'Groceries',
                executionOrder: 0,
                isActive: true,
            });
        });
    });

    describe('builders', () => {
        it('should split triggers and nested groups', () => {
            const {trigger, all, any, action} = RuleFactory;
            const rule = RuleFactory.createRule(
                'Salary',
                all(trigger('counterParty', 'equals', 'EMPLOYER INC'), any(trigger('amount', 'greaterThan', '0'))),
                [action('setCategory', 'Salary')],
                {id: 'salary', priority: 1, stopProcessing: true},
            );

            expect(rule.triggerGroup).toEqual({
                logic: 'all',
                triggers: [{field: 'counterParty', operator: 'equals', value: 'EMPLOYER INC', negated: false}],
                groups: [{
                    logic: 'any',
                    triggers: [{field: 'amount', operator: 'greaterThan', value: '0', negated: false}],
                    groups: [],
                }],
            });
            expect(rule).toMatchObject({id: 'salary', priority: 1, stopProcessing: true, isActive: true});
            expect(describeRule(rule)).toBe('IF 2 conditions (ALL) THEN setCategory "Salary"');
        });

        it('should generate an id when none is given', () => {
            const rule = RuleFactory.createRule('Anything', RuleFactory.all(), []);
            expect(rule.id).toMatch(/^[0-9a-f-]{36}$/);
        });

        it('should reject a blank rule name', () => {
            expect(() => RuleFactory.createRule('  ', RuleFactory.all(), [])).toThrow(RuleDefinitionError);
        });
    });

    describe('rule helpers', () => {
        it('should describe single-trigger rules', () => {
            const rule = RuleFactory.createRule(
                'Netflix',
                RuleFactory.all(RuleFactory.trigger('description', 'contains', 'netflix')),
                [RuleFactory.action('setCategory', 'Subscriptions')],
            );
            expect(describeRule(rule)).toBe('IF description contains "netflix" THEN setCategory "Subscriptions"');
        });

        it('should detach rules from a deleted group', () => {
            const grouped = {...RuleFactory.createRule('A', RuleFactory.all(), [], {id: 'a'}), groupId: 'g1'};
            const other = {...RuleFactory.createRule('B', RuleFactory.all(), [], {id: 'b'}), groupId: 'g2'};

            expect(ungroupRules([grouped, other], 'g1').map(rule => rule.groupId)).toEqual([null, 'g2']);
        });
    });
});
