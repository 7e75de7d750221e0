import { ActivityBoard } from "@/components/activities/ActivityBoard";

export default function Home() {
  return (
    <div className="page">
      <ActivityBoard />
    </div>
  );
}
