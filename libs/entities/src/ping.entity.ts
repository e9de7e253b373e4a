import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import type { InreachPayload } from '@milemark/tracker';

@Entity('pings')
export class Ping {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar', length: 200 })
  raceName!: string;

  @Column({ type: 'jsonb' })
  payload!: InreachPayload;

  /** How the engine treated the fix: accepted, or the reason it was rejected */
  @Column({ type: 'varchar', length: 32 })
  outcome!: string;

  @Column({ type: 'double precision', nullable: true })
  mileMark!: number | null;

  @Index()
  @CreateDateColumn()
  receivedAt!: Date;
}
