import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import type { InreachPayload, PersistedAidStationTimes } from '@milemark/tracker';

@Entity('race_states')
export class RaceState {
  @PrimaryColumn({ type: 'varchar', length: 200 })
  raceName!: string;

  @Column({ type: 'double precision', default: 0 })
  mileMark!: number;

  @Column({ type: 'double precision', default: 0 })
  elevation!: number;

  @Column({ type: 'int', default: 0 })
  pings!: number;

  @Column({ type: 'boolean', default: false })
  lowBattery!: boolean;

  @Column({ type: 'int', default: 300 })
  trackInterval!: number;

  @Column({ type: 'jsonb', nullable: true })
  lastPayload!: InreachPayload | null;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  aidStations!: PersistedAidStationTimes[];

  @UpdateDateColumn()
  updatedAt!: Date;
}
