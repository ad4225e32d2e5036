import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

@Entity('sys_setting_items')
@Unique('uq_sys_setting_item', ['sysId', 'key'])
export class SysSettingItem {
  @PrimaryGeneratedColumn({ unsigned: true })
  id!: number;

  @Column({ name: 'sys_id', unsigned: true })
  sysId!: number;

  @Column({ type: 'varchar', length: 100 })
  key!: string;

  @Column({ type: 'text' })
  val!: string;
}
