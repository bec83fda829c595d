import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { PermissionStatus } from '../../../../domain/enums/permission-status.enum';
import { PermissionType } from '../../../../domain/enums/permission-type.enum';

@Entity({
  name: 'permissions',
})
@Index(['status', 'endTime'])
@Index(['principalName', 'principalHost'])
export class PermissionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'principal_name', type: 'varchar', length: 32 })
  principalName!: string;

  @Column({ name: 'principal_host', type: 'varchar', length: 64 })
  principalHost!: string;

  @Column({ name: 'resource_name', type: 'varchar', length: 129 })
  resourceName!: string;

  @Column({ type: 'varchar', length: 20 })
  type!: PermissionType;

  @Column({ name: 'start_time', type: 'timestamptz' })
  startTime!: Date;

  @Column({ name: 'end_time', type: 'timestamptz' })
  endTime!: Date;

  @Column({ type: 'varchar', length: 20, default: PermissionStatus.PENDING })
  status!: PermissionStatus;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'created_by', type: 'varchar', length: 255 })
  createdBy!: string;

  @Column({ name: 'approved_by', type: 'varchar', length: 255, nullable: true })
  approvedBy!: string | null;

  @Column({ name: 'approved_at', type: 'timestamptz', nullable: true })
  approvedAt!: Date | null;

  @Column({ name: 'revoked_by', type: 'varchar', length: 255, nullable: true })
  revokedBy!: string | null;

  @Column({ name: 'revoked_at', type: 'timestamptz', nullable: true })
  revokedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
