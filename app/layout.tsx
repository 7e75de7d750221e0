import type { Metadata } from "next";
import "./globals.css";
import { GraduationCap } from "lucide-react";

export const metadata: Metadata = {
  title: "Mergington High School Activities",
  description: "Browse extracurricular activities and sign up students",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>
        <header className="site-header">
          <GraduationCap className="icon-large" />
          <div>
            <h1>Mergington High School</h1>
            <h2>Extracurricular Activities</h2>
          </div>
        </header>
        <main>{children}</main>
        <footer className="site-footer">
          <p>&copy; Mergington High School</p>
        </footer>
      </body>
    </html>
  );
}
