import { MigrationInterface, QueryRunner, Table, TableColumnOptions } from 'typeorm';

const idColumn: TableColumnOptions = {
  name: 'id',
  type: 'uuid',
  isPrimary: true,
  generationStrategy: 'uuid',
  default: 'uuid_generate_v4()',
};

const timestamps: TableColumnOptions[] = [
  { name: 'createdAt', type: 'timestamp', default: 'now()' },
  { name: 'updatedAt', type: 'timestamp', default: 'now()' },
];

const money = (name: string): TableColumnOptions => ({ name, type: 'decimal', precision: 12, scale: 2 });

const isActive: TableColumnOptions = { name: 'isActive', type: 'boolean', default: true };

export class CreateBillingLedgerTables1767225600000 implements MigrationInterface {
  name = 'CreateBillingLedgerTables1767225600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.createTable(
      new Table({
        name: 'schools',
        columns: [
          idColumn,
          { name: 'name', type: 'varchar', length: '255' },
          { name: 'address', type: 'varchar', length: '500', isNullable: true },
          { name: 'phone', type: 'varchar', length: '50', isNullable: true },
          { name: 'email', type: 'varchar', length: '255', isNullable: true },
          isActive,
          ...timestamps,
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'grades',
        columns: [
          idColumn,
          { name: 'schoolId', type: 'uuid' },
          { name: 'name', type: 'varchar', length: '100' },
          money('monthlyFee'),
          isActive,
          ...timestamps,
        ],
        checks: [{ name: 'CHK_grades_monthly_fee_positive', expression: `"monthlyFee" > 0` }],
        foreignKeys: [
          { columnNames: ['schoolId'], referencedTableName: 'schools', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
        ],
        indices: [{ name: 'IDX_GRADES_SCHOOL', columnNames: ['schoolId'] }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'students',
        columns: [
          idColumn,
          { name: 'schoolId', type: 'uuid' },
          { name: 'gradeId', type: 'uuid', isNullable: true },
          { name: 'gradeLevel', type: 'varchar', length: '50', isNullable: true },
          { name: 'firstName', type: 'varchar', length: '100' },
          { name: 'lastName', type: 'varchar', length: '100' },
          { name: 'email', type: 'varchar', length: '255', isNullable: true },
          { name: 'enrolledAt', type: 'date' },
          isActive,
          ...timestamps,
        ],
        foreignKeys: [
          { columnNames: ['schoolId'], referencedTableName: 'schools', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
          { columnNames: ['gradeId'], referencedTableName: 'grades', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
        ],
        indices: [
          { name: 'IDX_STUDENTS_SCHOOL', columnNames: ['schoolId'] },
          { name: 'IDX_STUDENTS_GRADE', columnNames: ['gradeId'] },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'billing_items',
        columns: [
          idColumn,
          { name: 'schoolId', type: 'uuid' },
          { name: 'name', type: 'varchar', length: '255' },
          { name: 'description', type: 'text', isNullable: true },
          money('amount'),
          { name: 'isRecurring', type: 'boolean', default: false },
          { name: 'academicYear', type: 'varchar', length: '20', isNullable: true },
          isActive,
          ...timestamps,
        ],
        foreignKeys: [
          { columnNames: ['schoolId'], referencedTableName: 'schools', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'invoices',
        columns: [
          idColumn,
          { name: 'studentId', type: 'uuid' },
          { name: 'billingItemId', type: 'uuid', isNullable: true },
          money('amount'),
          { name: 'dueDate', type: 'date' },
          {
            name: 'status',
            type: 'enum',
            enum: ['PENDING', 'PARTIAL', 'PAID', 'OVERDUE', 'CANCELLED'],
            enumName: 'invoices_status_enum',
            default: `'PENDING'`,
          },
          { name: 'description', type: 'text', isNullable: true },
          ...timestamps,
        ],
        checks: [{ name: 'CHK_invoices_amount_positive', expression: `"amount" > 0` }],
        foreignKeys: [
          { columnNames: ['studentId'], referencedTableName: 'students', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
          { columnNames: ['billingItemId'], referencedTableName: 'billing_items', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
        ],
        indices: [
          { name: 'IDX_INVOICES_STUDENT', columnNames: ['studentId'] },
          { name: 'IDX_INVOICES_DUE_DATE', columnNames: ['dueDate'] },
          { name: 'IDX_INVOICES_STATUS', columnNames: ['status'] },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'payments',
        columns: [
          idColumn,
          { name: 'invoiceId', type: 'uuid' },
          money('amount'),
          { name: 'paymentDate', type: 'date', default: 'CURRENT_DATE' },
          {
            name: 'method',
            type: 'enum',
            enum: ['CASH', 'BANK_TRANSFER', 'CREDIT_CARD', 'DEBIT_CARD', 'OTHER'],
            enumName: 'payments_method_enum',
            default: `'CASH'`,
          },
          { name: 'reference', type: 'varchar', length: '255', isNullable: true },
          { name: 'createdAt', type: 'timestamp', default: 'now()' },
        ],
        checks: [{ name: 'CHK_payments_amount_positive', expression: `"amount" > 0` }],
        foreignKeys: [
          { columnNames: ['invoiceId'], referencedTableName: 'invoices', referencedColumnNames: ['id'], onDelete: 'RESTRICT' },
        ],
        indices: [
          { name: 'IDX_PAYMENTS_INVOICE', columnNames: ['invoiceId'] },
          { name: 'IDX_PAYMENTS_DATE', columnNames: ['paymentDate'] },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of ['payments', 'invoices', 'billing_items', 'students', 'grades', 'schools']) {
      await queryRunner.dropTable(table, true, true, true);
    }
    await queryRunner.query(`DROP TYPE IF EXISTS "payments_method_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "invoices_status_enum"`);
  }
}
