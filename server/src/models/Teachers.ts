/// src/models/Teachers.ts
import mongoose, { Schema } from "mongoose";

export interface ITeacher {
  _id: string; // username
  display_name: string;
  role: "teacher" | "admin";
}

const TeacherSchema: Schema = new Schema<ITeacher>(
  {
    _id: { type: String, required: true }, // e.g., mrodriguez
    display_name: { type: String, required: true, maxlength: 100 },
    role: { type: String, enum: ["teacher", "admin"], default: "teacher" },
  },
  { versionKey: false }
);

export const Teacher = mongoose.model<ITeacher>(
  "Teacher",
  TeacherSchema,
  "teachers"
);
