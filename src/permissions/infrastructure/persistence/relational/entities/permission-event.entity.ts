import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { PermissionEventType } from '../../../../domain/enums/permission-event-type.enum';
import { PermissionEntity } from './permission.entity';

@Entity({
  name: 'permission_events',
})
export class PermissionEventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => PermissionEntity, { nullable: false })
  @JoinColumn({ name: 'permission_id' })
  permission?: PermissionEntity;

  @Column({ name: 'permission_id', type: 'integer' })
  @Index()
  permissionId!: number;

  @Column({ name: 'event_type', type: 'varchar', length: 20 })
  eventType!: PermissionEventType;

  @Column({ name: 'triggered_by', type: 'varchar', length: 255 })
  triggeredBy!: string;

  @Column({ type: 'text' })
  details!: string;

  @Column({ type: 'boolean', default: true })
  success!: boolean;

  @Column({ name: 'event_time', type: 'timestamptz' })
  @Index()
  eventTime!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
