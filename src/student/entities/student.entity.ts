import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { School } from '../../school/entities/school.entity';
import { Grade } from '../../grades/entity/grade.entity';
import { Invoice } from '../../billing/entities/invoice.entity';

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, (school) => school.students, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @Column({ type: 'uuid', nullable: true })
  gradeId?: string | null;

  @ManyToOne(() => Grade, (grade) => grade.students, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'gradeId' })
  grade?: Grade | null;

  // Free-text grade kept for students enrolled before grades were priced
  @Column({ type: 'varchar', length: 50, nullable: true })
  gradeLevel?: string | null;

  @Column({ type: 'varchar', length: 100 })
  firstName!: string;

  @Column({ type: 'varchar', length: 100 })
  lastName!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email?: string | null;

  @Column({ type: 'date' })
  enrolledAt!: string;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => Invoice, (invoice) => invoice.student)
  invoices?: Invoice[];
}
