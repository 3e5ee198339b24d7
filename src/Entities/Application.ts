import { Column, Entity, Index, PrimaryColumn } from "typeorm";

// ids are unique per owner, so the key is (username, id)
@Entity({ name: "applications" })
@Index(["username", "timestamp"])
export class Application {
  @PrimaryColumn({ type: "varchar", length: 64 })
  username!: string;

  @PrimaryColumn({ type: "int" })
  id!: number;

  @Column({ type: "varchar", length: 255 })
  company!: string;

  @Column({ name: "jobdescription", type: "text", default: "" })
  jobDescription!: string;

  @Column({ name: "filename", type: "varchar", length: 255, default: "" })
  originalFilename!: string;

  @Column()
  timestamp!: Date;

  @Column({ name: "download_link", type: "text", default: "" })
  downloadLink!: string;

  @Column({ name: "view_link", type: "text", default: "" })
  viewLink!: string;

  @Column({ type: "varchar", length: 50, default: "applied" })
  status!: string;
}
