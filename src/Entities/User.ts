import { Column, CreateDateColumn, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

@Entity({ name: "users" })
export class User {
  @PrimaryColumn({ type: "varchar", length: 64 })
  username!: string;

  // hash only, never the plain password
  @Column({ name: "password", type: "varchar", length: 255 })
  passwordHash!: string;

  @Column({ type: "varchar", length: 50, default: "user" })
  role!: string;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;

  @UpdateDateColumn({ name: "updated_at" })
  updatedAt!: Date;
}
