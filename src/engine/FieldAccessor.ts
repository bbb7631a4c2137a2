import {Decimal} from 'decimal.js';
import {TriggerField} from "../entities/Rule";
import {effectiveCategory, Transaction, TransactionType} from "../entities/Transaction";
import {EXTERNAL_ID_PREFIX, INTERNAL_REFERENCE_PREFIX, parseTags, readMarker} from "./notes";
import {parseDay, parseDecimal} from "./values";

/**
 * Typed value of a transaction field.
 */
export type FieldValue =
    | { readonly kind: 'text'; readonly value: string }
    | { readonly kind: 'number'; readonly value: Decimal }
    | { readonly kind: 'date'; readonly value: string | null }
    | { readonly kind: 'category'; readonly value: string }
    | { readonly kind: 'transactionType'; readonly value: TransactionType }
    | { readonly kind: 'tags'; readonly value: readonly string[] };

export type FieldKind = FieldValue['kind'];

/**
 * Value kind of each trigger field, known without looking at a transaction.
 */
export function fieldKind(field: TriggerField): FieldKind {
    switch (field) {
        case 'amount':
            return 'number';
        case 'date':
            return 'date';
        case 'category':
            return 'category';
        case 'transactionType':
            return 'transactionType';
        case 'tags':
            return 'tags';
        case 'description':
        case 'accountName':
        case 'counterParty':
        case 'standardizedName':
        case 'iban':
        case 'counterIban':
        case 'notes':
        case 'externalId':
        case 'internalReference':
            return 'text';
    }
}

/**
 * Extracts a field from a transaction. Never fails: missing text is "", a missing or unreadable
 * amount is 0 and a missing category is the "Uncategorized" sentinel.
 *
 * The amount is reported as a magnitude, the sign is carried by the transaction type.
 */
export function extractField(field: TriggerField, transaction: Transaction): FieldValue {
    switch (field) {
        case 'description':
            return text(transaction.description);
        case 'accountName':
            return text(transaction.account?.name);
        case 'counterParty':
            return text(transaction.counterName);
        case 'standardizedName':
            return text(transaction.standardizedName);
        case 'amount':
            return {kind: 'number', value: (parseDecimal(transaction.amount) ?? new Decimal(0)).abs()};
        case 'date':
            return {kind: 'date', value: parseDay(transaction.date)};
        case 'iban':
            return text(transaction.account?.iban);
        case 'counterIban':
            return text(transaction.counterIban);
        case 'transactionType':
            return {kind: 'transactionType', value: transaction.transactionType};
        case 'category':
            return {kind: 'category', value: effectiveCategory(transaction)};
        case 'notes':
            return text(transaction.notes);
        case 'externalId':
            return text(readMarker(transaction.notes, EXTERNAL_ID_PREFIX));
        case 'internalReference':
            return text(readMarker(transaction.notes, INTERNAL_REFERENCE_PREFIX));
        case 'tags':
            return {kind: 'tags', value: parseTags(transaction.notes)};
    }
}

function text(value: string | null | undefined): FieldValue {
    return {kind: 'text', value: value ?? ''};
}
