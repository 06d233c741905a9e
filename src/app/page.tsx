import type { Metadata } from "next";
import { EmulatorPage } from "@/components/EmulatorPage";

export const metadata: Metadata = {
  title: "CHIP-8 Emulator",
  description: "Browser-based CHIP-8 virtual machine with a 64×32 text display and hex keypad",
};

export default function Home() {
  return <EmulatorPage />;
}
