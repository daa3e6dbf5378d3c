import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateInvoiceDto } from './create-invoice.dto';
import { RecordPaymentDto } from './record-payment.dto';
import { UpdateInvoiceDto } from './update-invoice.dto';

const STUDENT_ID = '6f1c2a4e-8b3d-4c5e-9f70-1a2b3c4d5e6f';
const INVOICE_ID = '0d9e8f7a-6b5c-4d3e-8f21-0a1b2c3d4e5f';

const failedConstraints = async (dto: object): Promise<string[]> => {
  const errors = await validate(dto);
  return errors.flatMap((error) => Object.keys(error.constraints ?? {}));
};

describe('billing DTO amounts', () => {
  it('accepts the largest amount a money column holds', async () => {
    const dto = plainToInstance(CreateInvoiceDto, { studentId: STUDENT_ID, amount: 9999999999.99, dueDate: '2025-09-30' });

    await expect(failedConstraints(dto)).resolves.toEqual([]);
  });

  it('rejects an invoice amount past the column range', async () => {
    const dto = plainToInstance(CreateInvoiceDto, { studentId: STUDENT_ID, amount: 1e13, dueDate: '2025-09-30' });

    await expect(failedConstraints(dto)).resolves.toEqual(['max']);
  });

  it('rejects the same amount on an invoice edit', async () => {
    const dto = plainToInstance(UpdateInvoiceDto, { amount: 1e13 });

    await expect(failedConstraints(dto)).resolves.toEqual(['max']);
  });

  it('rejects a payment amount past the column range', async () => {
    const dto = plainToInstance(RecordPaymentDto, { invoiceId: INVOICE_ID, amount: 1e13 });

    await expect(failedConstraints(dto)).resolves.toEqual(['max']);
  });
});
