import { getMetadataArgsStorage } from 'typeorm';

import { StudentAccount } from './student-account.entity';

function columnOptions(propertyName: string) {
  const column = getMetadataArgsStorage().columns.find(
    (args) => args.target === StudentAccount && args.propertyName === propertyName,
  );
  return column?.options;
}

describe('StudentAccount columns', () => {
  it('stores free text as text, like the migration', () => {
    expect(columnOptions('passwordHash')).toMatchObject({ name: 'password_hash', type: 'text', select: false });
    expect(columnOptions('fullName')).toMatchObject({ name: 'full_name', type: 'text' });
    expect(columnOptions('email')).toMatchObject({ type: 'text', nullable: true });
  });

  it('keeps identifiers bounded at 20 characters', () => {
    expect(columnOptions('nemisNumber')).toMatchObject({ type: 'varchar', length: 20, nullable: true });
    expect(columnOptions('nationalId')).toMatchObject({ type: 'varchar', length: 20, nullable: true });
  });
});
