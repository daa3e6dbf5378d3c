import { School } from '../school/entities/school.entity';
import { Grade } from '../grades/entity/grade.entity';
import { Student } from '../student/entities/student.entity';
import { BillingItem } from '../billing/entities/billing-item.entity';
import { Invoice } from '../billing/entities/invoice.entity';
import { Payment } from '../billing/entities/payment.entity';

export const LEDGER_ENTITIES = [School, Grade, Student, BillingItem, Invoice, Payment];
