// src/stores/teacherDirectory.ts
import { ITeacher, Teacher } from "../models/Teachers";

export interface TeacherDirectory {
  findByUsername(username: string): Promise<ITeacher | null>;
}

export const createMongoTeacherDirectory = (): TeacherDirectory => ({
  async findByUsername(username) {
    return Teacher.findById(username).lean<ITeacher>();
  },
});
