import { Column, Entity, PrimaryColumn } from 'typeorm';

/** One calendar month of competition, numbered `YYYYMM`. */
@Entity('seasons')
export class SeasonEntity {
  @PrimaryColumn()
  number!: number;

  @Column()
  name!: string;

  @Column({ type: 'timestamp' })
  startsAt!: Date;

  /** Exclusive. */
  @Column({ type: 'timestamp' })
  endsAt!: Date;
}
