import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, CreateDateColumn, UpdateDateColumn, JoinColumn, OneToMany } from 'typeorm';
import { School } from '../../school/entities/school.entity';
import { Student } from '../../student/entities/student.entity';
import { decimalTransformer } from '../../common/utils/money.util';

/** A school's pricing tier; sets the recurring tuition of its students. */
@Entity('grades')
export class Grade {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, (school) => school.grades, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  monthlyFee!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => Student, (student) => student.grade)
  students?: Student[];
}
