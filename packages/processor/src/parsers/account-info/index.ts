import { field } from '../../statement/fields.js';
import type { AccountField, Section } from '../../statement/types.js';
import { parseSectionLines } from '../interface.js';
import type { SectionParser, SectionParseResult } from '../interface.js';

const FIELD_NAME = field('Field Name');
const FIELD_VALUE = field('Field Value');

export class AccountInfoParser implements SectionParser<AccountField> {
  readonly kind = 'account_info' as const;

  parse(section: Section): SectionParseResult<AccountField> {
    return parseSectionLines(section, (row, line) => ({
      kind: 'account_field',
      field: row.requireText(FIELD_NAME),
      value: row.requireText(FIELD_VALUE),
      lineNumber: line.lineNumber,
    }));
  }
}

export interface AccountDetails {
  accountId?: string;
  baseCurrency?: string;
  name?: string;
}

export function accountDetails(fields: readonly AccountField[]): AccountDetails {
  const details: AccountDetails = {};
  for (const { field: name, value } of fields) {
    switch (name.trim().toLowerCase()) {
      case 'account':
        details.accountId ??= value;
        break;
      case 'base currency':
        details.baseCurrency ??= value.toUpperCase();
        break;
      case 'name':
        details.name ??= value;
        break;
    }
  }
  return details;
}
