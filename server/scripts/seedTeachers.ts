import mongoose from "mongoose";
import { Teacher, ITeacher } from "../src/models/Teachers";
import { config } from "../src/config";

const TEACHERS: ITeacher[] = [
  { _id: "mrodriguez", display_name: "Mr. Rodriguez", role: "admin" },
  { _id: "mchen", display_name: "Ms. Chen", role: "teacher" },
];

async function seedTeachers() {
  await mongoose.connect(config.mongoUri);
  console.log("Connected to MongoDB");

  for (const { _id, ...fields } of TEACHERS) {
    await Teacher.updateOne({ _id }, { $set: fields }, { upsert: true });
    console.log(`✅ Teacher ${_id} upserted`);
  }

  await mongoose.disconnect();
}

seedTeachers().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
